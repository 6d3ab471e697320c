export { createApp } from "./app";
export type { AppOptions } from "./app";
export { buildClassifierPrompt, interpretClassifierOutput } from "./classifier";
export { loadConfig, MAX_RESULTS, routeTokens } from "./config";
export type { AppConfig } from "./config";
export {
  ConfigError,
  InvalidInputError,
  isRouterError,
  RouterError,
  RoutingExhaustedError,
  UpstreamError,
} from "./errors";
export type { RouterErrorCode, UpstreamDependency } from "./errors";
export { extractChannel, fromGeneralItem, fromPlatformItem, normalizeItems } from "./normalize";
export { buildRouterDeps, createGeminiClassifier, createSerpApiProvider, createYouTubeProvider } from "./providers";
export { toErrorResponse, toSearchResponse } from "./response";
export type { ErrorResponse, SearchResponse } from "./response";
export { attemptPlatformSearch, createRouter, routeQuery } from "./router";
export type { PlatformAttempt, QueryRouter } from "./router";
export type * from "./types";
