import { describe, expect, it } from "vitest";
import { buildClassifierPrompt, interpretClassifierOutput } from "./classifier";

describe("buildClassifierPrompt", () => {
  it("embeds the query and both route tokens", () => {
    const prompt = buildClassifierPrompt("best pasta recipe");

    expect(prompt).toBe(
      [
        "You are a helpful assistant. The user asked:",
        '"best pasta recipe"',
        "",
        "- If you can answer this directly, just give the answer.",
        "- Otherwise reply exactly GOOGLE or YOUTUBE (no extra text).",
      ].join("\n"),
    );
  });
});

describe("interpretClassifierOutput", () => {
  it.each([
    ["GOOGLE", "GENERAL"],
    ["google", "GENERAL"],
    ["  Google\n", "GENERAL"],
    ["YOUTUBE", "PLATFORM"],
    ["youtube", "PLATFORM"],
    ["YouTube ", "PLATFORM"],
  ])("routes %j to %s", (raw, token) => {
    expect(interpretClassifierOutput(raw)).toEqual({ kind: "route", token });
  });

  it("treats any other text as a direct answer, trimmed", () => {
    expect(interpretClassifierOutput("  4 \n")).toEqual({ kind: "answer", text: "4" });
  });

  it("does not route on substrings of a token", () => {
    expect(interpretClassifierOutput("Search YouTube for that")).toEqual({
      kind: "answer",
      text: "Search YouTube for that",
    });
    expect(interpretClassifierOutput("GOOGLE.")).toEqual({ kind: "answer", text: "GOOGLE." });
  });

  it("does not treat object property names as tokens", () => {
    expect(interpretClassifierOutput("constructor")).toEqual({ kind: "answer", text: "constructor" });
  });

  it("returns null for empty output", () => {
    expect(interpretClassifierOutput("")).toBeNull();
    expect(interpretClassifierOutput("   \n")).toBeNull();
  });
});
