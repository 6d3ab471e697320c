import { z } from "zod";
import { ConfigError } from "./errors";
import type { RouteToken } from "./types";

// Literal replies the classifier may give instead of an answer, keyed lower-case.
export const routeTokens: ReadonlyMap<string, RouteToken> = new Map<string, RouteToken>([
  ["google", "GENERAL"],
  ["youtube", "PLATFORM"],
]);

export const MAX_RESULTS = 5;

// Blank env values ("KEY=") count as unset.
const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().optional(),
);

const configSchema = z.object({
  port: z.coerce.number().int().positive().default(8081),
  corsOrigins: z
    .string()
    .default("*")
    .transform((raw) =>
      raw
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    ),

  gemini: z.object({
    apiKey: optionalString,
    model: z.string().default("gemini-2.0-flash"),
    baseURL: z.string().url().default("https://generativelanguage.googleapis.com/v1beta/openai/"),
  }),

  serpapi: z.object({
    apiKey: optionalString,
  }),

  youtube: z.object({
    apiKey: optionalString,
  }),
});

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  gemini: { apiKey: string; model: string; baseURL: string };
  serpapi: { apiKey?: string };
  youtube: { apiKey?: string };
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse({
    port: blankToUndefined(env.QUERY_ROUTER_PORT),
    corsOrigins: blankToUndefined(env.CORS_ORIGINS),
    gemini: {
      apiKey: env.GEMINI_API_KEY,
      model: blankToUndefined(env.GEMINI_MODEL),
      baseURL: blankToUndefined(env.GEMINI_BASE_URL),
    },
    serpapi: {
      apiKey: blankToUndefined(env.SERPAPI_KEY) ?? env.SERPAPI_API_KEY,
    },
    youtube: {
      apiKey: env.YOUTUBE_API_KEY,
    },
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const { gemini, ...rest } = parsed.data;
  if (!gemini.apiKey) {
    throw new ConfigError("GEMINI_API_KEY must be set in environment");
  }

  return { ...rest, gemini: { ...gemini, apiKey: gemini.apiKey } };
}
