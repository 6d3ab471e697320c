import { z } from "zod";
import type { GeneralVideoItem, GeneralVideoProvider, SearchMode } from "../types";

const SERPAPI_URL = "https://serpapi.com/search.json";

// Engine and query parameter differ per search mode.
const engines: Record<SearchMode, { engine: string; queryParam: string }> = {
  general: { engine: "google_videos", queryParam: "q" },
  platform: { engine: "youtube", queryParam: "search_query" },
};

const videoItemSchema = z
  .object({
    title: z.string().nullish(),
    link: z.string().nullish(),
    description: z.string().nullish(),
    channel: z.object({ name: z.string().nullish() }).passthrough().nullish(),
    channel_name: z.string().nullish(),
    views: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough();

const searchResponseSchema = z
  .object({
    video_results: z.array(videoItemSchema).optional(),
    error: z.string().optional(),
  })
  .passthrough();

export interface SerpApiOptions {
  apiKey: string;
  fetchImpl?: typeof fetch;
}

export function createSerpApiProvider({ apiKey, fetchImpl = fetch }: SerpApiOptions): GeneralVideoProvider {
  return {
    id: "serpapi",

    async searchVideos(query: string, mode: SearchMode): Promise<GeneralVideoItem[]> {
      const { engine, queryParam } = engines[mode];
      const params = new URLSearchParams({
        engine,
        [queryParam]: query,
        api_key: apiKey,
      });

      const response = await fetchImpl(`${SERPAPI_URL}?${params}`, {
        method: "GET",
        headers: { Accept: "application/json" },
      });

      if (!response.ok) {
        const body = await response.json().catch(() => null);
        const parsedError = searchResponseSchema.safeParse(body);
        const message = parsedError.success ? parsedError.data.error : undefined;
        throw new Error(`SerpAPI ${engine} returned ${response.status}: ${message || response.statusText}`);
      }

      const data = searchResponseSchema.parse(await response.json());
      // A 2xx body with only an `error` means the engine found nothing.
      return data.video_results ?? [];
    },
  };
}
