import type { AppConfig } from "../config";
import type { RouterDeps } from "../types";
import { createGeminiClassifier } from "./gemini";
import { createSerpApiProvider } from "./serpapi";
import { createYouTubeProvider } from "./youtube";

// Providers without a credential are left out; the router treats them as unconfigured.
export function buildRouterDeps(config: AppConfig, fetchImpl: typeof fetch = fetch): RouterDeps {
  const { serpapi, youtube } = config;
  return {
    classifier: createGeminiClassifier(config.gemini),
    generalProvider: serpapi.apiKey ? createSerpApiProvider({ apiKey: serpapi.apiKey, fetchImpl }) : undefined,
    platformProvider: youtube.apiKey ? createYouTubeProvider({ apiKey: youtube.apiKey, fetchImpl }) : undefined,
  };
}

export { createGeminiClassifier, createSerpApiProvider, createYouTubeProvider };
