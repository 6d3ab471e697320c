import { createInterface } from "node:readline";
import { stdin, stdout } from "node:process";
import { loadConfig } from "./config";
import { describeError } from "./errors";
import { buildRouterDeps } from "./providers";
import { createRouter } from "./router";
import type { QueryRouter } from "./router";
import type { SearchResult } from "./types";

const EXIT_WORDS = new Set(["exit", "quit"]);

export function shouldExit(input: string): boolean {
  const trimmed = input.trim();
  return !trimmed || EXIT_WORDS.has(trimmed.toLowerCase());
}

export function formatResult(result: SearchResult): string[] {
  if (result.kind === "answer") {
    return ["Answer:", result.text];
  }

  const heading = result.source === "general" ? "Video results:" : "Platform video results:";
  if (result.records.length === 0) {
    return [heading, "No video results found."];
  }

  const lines = [heading];
  result.records.forEach((video, index) => {
    let line = `${index + 1}. ${video.title || "-"}`;
    if (video.channel) line += ` (Channel: ${video.channel})`;
    if (video.views) line += ` [${video.views}]`;
    lines.push(line);
    lines.push(`    ${video.link || "-"}`);
    if (video.description) {
      lines.push(`    ${video.description}`);
    }
  });
  return lines;
}

export const PROMPT = "\nEnter your search query (or 'exit' to quit): ";

export interface CliIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export async function runCli(router: QueryRouter, { input = stdin, output = stdout }: Partial<CliIO> = {}): Promise<void> {
  // Lines that arrive while a query is in flight stay buffered in the iterator.
  const rl = createInterface({ input, terminal: false });
  const print = (text: string) => output.write(`${text}\n`);

  try {
    output.write(PROMPT);
    for await (const line of rl) {
      if (shouldExit(line)) {
        break;
      }

      try {
        const result = await router.route(line);
        print(["", ...formatResult(result)].join("\n"));
      } catch (err) {
        print(`Error: ${describeError(err)}`);
      }
      output.write(PROMPT);
    }
  } finally {
    rl.close();
    print("Goodbye!");
  }
}

// Returns the process exit code; configuration problems print one line instead of a stack.
export async function startCli(env: NodeJS.ProcessEnv = process.env, io: Partial<CliIO> = {}): Promise<number> {
  try {
    const config = loadConfig(env);
    await runCli(createRouter(buildRouterDeps(config)), io);
    return 0;
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    return 1;
  }
}
