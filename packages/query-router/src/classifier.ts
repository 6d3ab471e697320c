import { routeTokens } from "./config";
import type { ClassifierOutcome } from "./types";

export function buildClassifierPrompt(query: string): string {
  return [
    "You are a helpful assistant. The user asked:",
    `"${query}"`,
    "",
    "- If you can answer this directly, just give the answer.",
    "- Otherwise reply exactly GOOGLE or YOUTUBE (no extra text).",
  ].join("\n");
}

// Only a full-string, case-insensitive token match routes ("Try YouTube" is an answer).
// Empty output is neither and yields null.
export function interpretClassifierOutput(raw: string): ClassifierOutcome | null {
  const text = raw.trim();
  if (!text) return null;

  const token = routeTokens.get(text.toLowerCase());
  if (token) {
    return { kind: "route", token };
  }
  return { kind: "answer", text };
}
