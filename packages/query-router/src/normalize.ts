import { MAX_RESULTS } from "./config";
import type { GeneralVideoItem, PlatformVideoItem, VideoRecord } from "./types";

// Structured channel object wins over the flat name field.
export function extractChannel(item: GeneralVideoItem): string | null {
  return item.channel?.name || item.channel_name || null;
}

function formatViews(views: GeneralVideoItem["views"]): string | null {
  if (typeof views === "string") return views;
  if (typeof views === "number") return String(views);
  return null;
}

export function fromGeneralItem(item: GeneralVideoItem): VideoRecord {
  return {
    title: item.title ?? "",
    link: item.link ?? "",
    description: item.description ?? null,
    channel: extractChannel(item),
    views: formatViews(item.views),
  };
}

export function fromPlatformItem(item: PlatformVideoItem): VideoRecord {
  return {
    title: item.snippet.title,
    link: `https://youtu.be/${item.id.videoId}`,
    description: null,
    channel: item.snippet.channelTitle,
    views: null,
  };
}

// Keeps provider order; never pads.
export function normalizeItems<T>(items: T[], adapt: (item: T) => VideoRecord): VideoRecord[] {
  return items.slice(0, MAX_RESULTS).map((item) => adapt(item));
}
