import { describe, it, expect } from "vitest";
import { MockLanguageModelV1 } from "ai/test";
import { PortfolioError } from "./errors";
import { requestCompletion } from "./completion";

function replying(text: string, prompts: unknown[] = []) {
  return new MockLanguageModelV1({
    doGenerate: async (options) => {
      prompts.push(options.prompt);
      return {
        rawCall: { rawPrompt: null, rawSettings: {} },
        finishReason: "stop",
        usage: { promptTokens: 12, completionTokens: 34 },
        text,
      };
    },
  });
}

function failing(message: string) {
  return new MockLanguageModelV1({
    doGenerate: async () => {
      throw new Error(message);
    },
  });
}

describe("requestCompletion", () => {
  it("returns the completion text", async () => {
    const text = await requestCompletion({
      prompt: "p",
      apiKey: "test-secret",
      languageModel: replying('{"portfolio":[]}'),
    });
    expect(text).toBe('{"portfolio":[]}');
  });

  it("sends the prompt as a single user message", async () => {
    const prompts: unknown[] = [];
    const model = replying("{}", prompts);
    await requestCompletion({ prompt: "Investment Thesis: x", apiKey: "test-secret", languageModel: model });

    expect(prompts).toHaveLength(1);
    expect(prompts[0]).toMatchObject([
      { role: "user", content: [{ type: "text", text: "Investment Thesis: x" }] },
    ]);
  });

  it("wraps provider errors as TransportFailure without retrying", async () => {
    let calls = 0;
    const model = new MockLanguageModelV1({
      doGenerate: async () => {
        calls++;
        throw new Error("429 rate limit reached");
      },
    });

    const pending = requestCompletion({ prompt: "p", apiKey: "test-secret", languageModel: model });

    await expect(pending).rejects.toBeInstanceOf(PortfolioError);
    await expect(pending).rejects.toMatchObject({
      kind: "TransportFailure",
      message: expect.stringContaining("429 rate limit reached"),
    });
    expect(calls).toBe(1);
  });

  it("hands an empty reply back for the parser to reject", async () => {
    const text = await requestCompletion({ prompt: "p", apiKey: "test-secret", languageModel: replying("  ") });
    expect(text).toBe("  ");
  });

  it("aborts a call that outlives the timeout", async () => {
    const model = new MockLanguageModelV1({
      doGenerate: ({ abortSignal }) =>
        new Promise<never>((_resolve, reject) => {
          if (!abortSignal) return;
          const signal = abortSignal;
          signal.addEventListener("abort", () => reject(signal.reason));
        }),
    });

    await expect(
      requestCompletion({ prompt: "p", apiKey: "test-secret", languageModel: model, timeoutMs: 20 }),
    ).rejects.toMatchObject({
      kind: "TransportFailure",
      message: "Completion request timed out after 20 ms.",
    });
  });

  it("reports authentication failures with the provider message", async () => {
    await expect(
      requestCompletion({ prompt: "p", apiKey: "test-secret", languageModel: failing("Incorrect API key provided") }),
    ).rejects.toMatchObject({
      kind: "TransportFailure",
      message: expect.stringContaining("Incorrect API key provided"),
    });
  });
});
