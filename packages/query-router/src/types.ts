// Where a delegated query is sent.
export type RouteToken = "GENERAL" | "PLATFORM";

// GENERAL searches the open web's video index, PLATFORM searches one video platform.
export type SearchMode = "general" | "platform";

export type ClassifierOutcome =
  | { kind: "answer"; text: string }
  | { kind: "route"; token: RouteToken };

export interface VideoRecord {
  title: string;
  link: string;
  description: string | null;
  channel: string | null;
  views: string | null; // provider formatting kept as-is ("1.2M views", "1234")
}

export type ResultSource = "general" | "platform";

// Which provider path produced a list. Only used for logging.
export type VideoOrigin = "general" | "platform" | "platform-fallback";

export type SearchResult =
  | { kind: "answer"; text: string }
  | {
      kind: "videos";
      source: ResultSource;
      origin: VideoOrigin;
      records: VideoRecord[];
    };

// Raw item as returned by the general search provider (both engines).
export interface GeneralVideoItem {
  title?: string | null;
  link?: string | null;
  description?: string | null;
  channel?: { name?: string | null } | null;
  channel_name?: string | null;
  views?: string | number | null;
}

// Raw item as returned by the platform's own search API.
export interface PlatformVideoItem {
  id: { videoId: string };
  snippet: {
    title: string;
    channelTitle: string;
  };
}

// What every collaborator module must implement:
export interface Classifier {
  id: string; // "gemini", ...
  modelId: string;
  classify(prompt: string): Promise<string>;
}

export interface GeneralVideoProvider {
  id: string;
  searchVideos(query: string, mode: SearchMode): Promise<GeneralVideoItem[]>;
}

export interface PlatformVideoProvider {
  id: string;
  searchVideos(query: string): Promise<PlatformVideoItem[]>;
}

// Providers are absent when their credential is not configured.
export interface RouterDeps {
  classifier: Classifier;
  generalProvider?: GeneralVideoProvider;
  platformProvider?: PlatformVideoProvider;
}
