import { isRouterError, UpstreamError } from "./errors";
import type { RouterError, UpstreamDependency } from "./errors";
import type { SearchResult, VideoRecord } from "./types";

export type SearchResponse =
  | { ok: true; source: "gemini"; answer: string }
  | { ok: true; source: "google_videos" | "youtube"; results: VideoRecord[] };

export interface ErrorResponse {
  ok: false;
  code: RouterError["code"] | "INTERNAL_ERROR";
  error: string;
  dependency?: UpstreamDependency;
}

// Wire names are the provider names clients already key on.
export function toSearchResponse(result: SearchResult): SearchResponse {
  if (result.kind === "answer") {
    return { ok: true, source: "gemini", answer: result.text };
  }
  return {
    ok: true,
    source: result.source === "general" ? "google_videos" : "youtube",
    results: result.records,
  };
}

export function toErrorResponse(err: unknown): { status: number; body: ErrorResponse } {
  if (isRouterError(err)) {
    const body: ErrorResponse = { ok: false, code: err.code, error: err.message };
    if (err instanceof UpstreamError) {
      body.dependency = err.dependency;
    }
    return { status: err.status, body };
  }
  const message = err instanceof Error ? err.message : "Unknown error";
  return { status: 500, body: { ok: false, code: "INTERNAL_ERROR", error: message } };
}
