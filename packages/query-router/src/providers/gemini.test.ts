import { beforeEach, describe, expect, it, vi } from "vitest";
import { createGeminiClassifier } from "./gemini";

const { create, clientOptions } = vi.hoisted(() => {
  const options: unknown[] = [];
  return { create: vi.fn(), clientOptions: options };
});

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create } };

    constructor(options: unknown) {
      clientOptions.push(options);
    }
  },
}));

const options = {
  apiKey: "test-key",
  model: "gemini-2.0-flash",
  baseURL: "https://llm.example.test/v1beta/openai/",
};

describe("createGeminiClassifier", () => {
  beforeEach(() => {
    create.mockReset();
    clientOptions.length = 0;
  });

  it("points the client at the configured endpoint", () => {
    const classifier = createGeminiClassifier(options);

    expect(clientOptions).toEqual([{ apiKey: "test-key", baseURL: "https://llm.example.test/v1beta/openai/" }]);
    expect(classifier.id).toBe("gemini");
    expect(classifier.modelId).toBe("gemini-2.0-flash");
  });

  it("sends the prompt as a single user message and trims the reply", async () => {
    create.mockResolvedValue({ choices: [{ message: { content: "  YOUTUBE\n" } }] });
    const classifier = createGeminiClassifier(options);

    const output = await classifier.classify("the prompt");

    expect(create).toHaveBeenCalledWith({
      model: "gemini-2.0-flash",
      messages: [{ role: "user", content: "the prompt" }],
    });
    expect(output).toBe("YOUTUBE");
  });

  it("returns an empty string when the model sends no content", async () => {
    create.mockResolvedValueOnce({ choices: [{ message: { content: null } }] });
    create.mockResolvedValueOnce({ choices: [] });
    const classifier = createGeminiClassifier(options);

    await expect(classifier.classify("p")).resolves.toBe("");
    await expect(classifier.classify("p")).resolves.toBe("");
  });

  it("propagates API failures", async () => {
    create.mockRejectedValue(new Error("401 API key not valid"));
    const classifier = createGeminiClassifier(options);

    await expect(classifier.classify("p")).rejects.toThrow("401 API key not valid");
  });
});
