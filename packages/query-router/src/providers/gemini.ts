import OpenAI from "openai";
import type { Classifier } from "../types";

export interface GeminiOptions {
  apiKey: string;
  model: string;
  baseURL: string; // Gemini's OpenAI-compatible endpoint
}

export function createGeminiClassifier({ apiKey, model, baseURL }: GeminiOptions): Classifier {
  const client = new OpenAI({ apiKey, baseURL });

  return {
    id: "gemini",
    modelId: model,

    async classify(prompt: string): Promise<string> {
      const response = await client.chat.completions.create({
        model,
        messages: [{ role: "user", content: prompt }],
      });

      const content = response.choices[0]?.message?.content ?? "";
      return content.trim();
    },
  };
}
