import { z } from "zod";
import { MAX_RESULTS } from "../config";
import type { PlatformVideoItem, PlatformVideoProvider } from "../types";

const YOUTUBE_SEARCH_URL = "https://www.googleapis.com/youtube/v3/search";

const searchItemSchema = z
  .object({
    id: z.object({ videoId: z.string() }).passthrough(),
    snippet: z
      .object({
        title: z.string(),
        channelTitle: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

const searchResponseSchema = z
  .object({
    items: z.array(searchItemSchema).optional(),
  })
  .passthrough();

const errorResponseSchema = z.object({
  error: z.object({ message: z.string().optional() }).passthrough(),
});

export interface YouTubeOptions {
  apiKey: string;
  fetchImpl?: typeof fetch;
}

export function createYouTubeProvider({ apiKey, fetchImpl = fetch }: YouTubeOptions): PlatformVideoProvider {
  return {
    id: "youtube-data-api",

    async searchVideos(query: string): Promise<PlatformVideoItem[]> {
      const params = new URLSearchParams({
        q: query,
        part: "snippet",
        type: "video",
        maxResults: String(MAX_RESULTS),
        key: apiKey,
      });

      const response = await fetchImpl(`${YOUTUBE_SEARCH_URL}?${params}`, {
        method: "GET",
        headers: { Accept: "application/json" },
      });

      if (!response.ok) {
        const body = await response.json().catch(() => null);
        const parsedError = errorResponseSchema.safeParse(body);
        const message = parsedError.success ? parsedError.data.error.message : undefined;
        throw new Error(`YouTube Data API error: ${message || response.statusText}`);
      }

      const data = searchResponseSchema.parse(await response.json());
      return data.items ?? [];
    },
  };
}
