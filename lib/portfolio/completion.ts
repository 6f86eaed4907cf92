import { createOpenAI } from "@ai-sdk/openai";
import { generateText, type LanguageModel } from "ai";

import { PortfolioError } from "./errors";

export const DEFAULT_MODEL = "gpt-3.5-turbo";
export const DEFAULT_TIMEOUT_MS = 60_000;

export type CompletionOptions = {
  prompt: string;
  apiKey: string;
  model?: string;
  baseURL?: string;
  timeoutMs?: number;
  /** Overrides the OpenAI-backed model; tests pass a mock here. */
  languageModel?: LanguageModel;
};

function describeFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return `Completion request timed out after ${timeoutMs} ms.`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `Completion request failed: ${message}`;
}

/**
 * One chat completion, no retries. Any transport, auth, rate-limit or timeout
 * failure surfaces as `TransportFailure`. The text is returned as-is, empty or
 * not; judging its shape is the parser's job.
 */
export async function requestCompletion({
  prompt,
  apiKey,
  model = DEFAULT_MODEL,
  baseURL,
  timeoutMs = DEFAULT_TIMEOUT_MS,
  languageModel,
}: CompletionOptions): Promise<string> {
  const resolvedModel = languageModel ?? createOpenAI({ apiKey, baseURL }).chat(model);

  try {
    const result = await generateText({
      model: resolvedModel,
      prompt,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(timeoutMs),
    });
    return result.text;
  } catch (error) {
    throw new PortfolioError("TransportFailure", describeFailure(error, timeoutMs), {
      cause: error,
    });
  }
}
