import { buildClassifierPrompt, interpretClassifierOutput } from "./classifier";
import {
  ConfigError,
  describeError,
  InvalidInputError,
  RoutingExhaustedError,
  UpstreamError,
} from "./errors";
import { fromGeneralItem, fromPlatformItem, normalizeItems } from "./normalize";
import type {
  GeneralVideoItem,
  GeneralVideoProvider,
  PlatformVideoItem,
  PlatformVideoProvider,
  RouteToken,
  RouterDeps,
  SearchResult,
} from "./types";

// Outcome of the primary platform call. Soft failures select the fallback, they are never surfaced.
export type PlatformAttempt =
  | { kind: "results"; items: PlatformVideoItem[] }
  | { kind: "soft_failure"; reason: "unconfigured" | "empty" | "error"; detail?: string };

export async function attemptPlatformSearch(
  query: string,
  provider: PlatformVideoProvider | undefined,
): Promise<PlatformAttempt> {
  if (!provider) {
    return { kind: "soft_failure", reason: "unconfigured" };
  }

  let items: PlatformVideoItem[];
  try {
    items = await provider.searchVideos(query);
  } catch (err) {
    return { kind: "soft_failure", reason: "error", detail: describeError(err) };
  }

  if (items.length === 0) {
    return { kind: "soft_failure", reason: "empty" };
  }
  return { kind: "results", items };
}

async function searchGeneral(query: string, provider: GeneralVideoProvider | undefined): Promise<SearchResult> {
  if (!provider) {
    throw new ConfigError("SERPAPI_KEY not set; cannot perform video search");
  }

  let items: GeneralVideoItem[];
  try {
    items = await provider.searchVideos(query, "general");
  } catch (err) {
    throw new UpstreamError("general", err);
  }

  return {
    kind: "videos",
    source: "general",
    origin: "general",
    records: normalizeItems(items, fromGeneralItem),
  };
}

async function searchPlatform(query: string, deps: RouterDeps): Promise<SearchResult> {
  const attempt = await attemptPlatformSearch(query, deps.platformProvider);

  if (attempt.kind === "results") {
    return {
      kind: "videos",
      source: "platform",
      origin: "platform",
      records: normalizeItems(attempt.items, fromPlatformItem),
    };
  }

  if (attempt.reason !== "unconfigured") {
    console.warn(
      `[Query-Router] platform search soft failure reason=${attempt.reason}` +
        (attempt.detail ? ` detail=${attempt.detail}` : "") +
        "; falling back",
    );
  }

  const fallback = deps.generalProvider;
  if (!fallback) {
    throw new ConfigError("No platform search credential available (need YOUTUBE_API_KEY or SERPAPI_KEY)");
  }

  let items: GeneralVideoItem[];
  try {
    items = await fallback.searchVideos(query, "platform");
  } catch (err) {
    throw new UpstreamError("platform_fallback", err);
  }

  return {
    kind: "videos",
    source: "platform",
    origin: "platform-fallback",
    records: normalizeItems(items, fromGeneralItem),
  };
}

function runRoute(token: RouteToken, query: string, deps: RouterDeps): Promise<SearchResult> {
  switch (token) {
    case "GENERAL":
      return searchGeneral(query, deps.generalProvider);
    case "PLATFORM":
      return searchPlatform(query, deps);
    default: {
      const unknown: never = token;
      throw new RoutingExhaustedError(`No search branch for route token: ${String(unknown)}`);
    }
  }
}

export async function routeQuery(rawQuery: string, deps: RouterDeps): Promise<SearchResult> {
  const query = rawQuery.trim();
  if (!query) {
    throw new InvalidInputError("Query must not be empty");
  }

  const start = Date.now();

  let output: string;
  try {
    output = await deps.classifier.classify(buildClassifierPrompt(query));
  } catch (err) {
    throw new UpstreamError("classifier", err);
  }

  const outcome = interpretClassifierOutput(output);
  if (!outcome) {
    throw new RoutingExhaustedError();
  }

  if (outcome.kind === "answer") {
    console.log(
      `[Query-Router] decision=answer classifier=${deps.classifier.id} model=${deps.classifier.modelId} ms=${Date.now() - start}`,
    );
    return { kind: "answer", text: outcome.text };
  }

  const result = await runRoute(outcome.token, query, deps);
  if (result.kind === "videos") {
    console.log(
      `[Query-Router] decision=${outcome.token} origin=${result.origin} results=${result.records.length} ms=${Date.now() - start}`,
    );
  }
  return result;
}

export function createRouter(deps: RouterDeps) {
  return {
    route: (query: string) => routeQuery(query, deps),
  };
}

export type QueryRouter = ReturnType<typeof createRouter>;
