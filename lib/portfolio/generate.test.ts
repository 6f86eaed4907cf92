import { describe, it, expect, vi } from "vitest";
import { generatePortfolio, type CompleteFn } from "./generate";
import type { ThesisFormValues } from "./request";

const today = new Date("2026-10-19T09:00:00Z");

const form: ThesisFormValues = {
  thesis: "Water scarcity will reprice utilities.",
  llmApiKey: "test-llm-key",
  marketDataApiKey: "test-market-key",
  timeframe: "MTD",
};

const reply = JSON.stringify({
  portfolio: [
    { symbol: "PHO", name: "Invesco Water Resources ETF", allocation: 45, justification: "Broad water exposure." },
    { symbol: "AWK", name: "American Water Works", allocation: 45, justification: "Largest listed US water utility." },
  ],
  overallJustification: "Concentrated bet on water infrastructure.",
});

describe("generatePortfolio", () => {
  it("runs the full pipeline", async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue(reply);

    const result = await generatePortfolio(form, { complete, today, random: () => 0 });

    expect(complete).toHaveBeenCalledTimes(1);
    const [prompt, apiKey] = complete.mock.calls[0];
    expect(prompt).toContain('Investment Thesis: "Water scarcity will reprice utilities."');
    expect(apiKey).toBe("test-llm-key");

    expect(result.normalized).toBe(true);
    expect(result.originalTotal).toBe(90);
    expect(result.portfolio.map((a) => a.allocation)).toEqual([50, 50]);
    expect(result.overallJustification).toBe("Concentrated bet on water infrastructure.");
    expect(result.timeframe).toBe("MTD");
    expect(result.days).toBe(18);
    expect(result.performance.labels).toHaveLength(18);
    expect(result.performance.labels[17]).toBe("2026-10-19");
    expect(result.rawCompletion).toBe(reply);
  });

  it("halts on an empty thesis without calling the model", async () => {
    const complete = vi.fn<CompleteFn>();

    await expect(generatePortfolio({ ...form, thesis: "" }, { complete, today })).rejects.toMatchObject({
      kind: "MissingInput",
      fields: ["thesis"],
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it("surfaces malformed model output with the raw text", async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue("I cannot help with that.");

    await expect(generatePortfolio(form, { complete, today })).rejects.toMatchObject({
      kind: "MalformedResponse",
      raw: "I cannot help with that.",
    });
  });

  it("reports an empty reply as malformed", async () => {
    const complete = vi.fn<CompleteFn>().mockResolvedValue("");

    await expect(generatePortfolio(form, { complete, today })).rejects.toMatchObject({
      kind: "MalformedResponse",
      raw: "",
    });
  });

  it("passes transport failures through", async () => {
    const failure = new Error("socket hang up");
    const complete = vi.fn<CompleteFn>().mockRejectedValue(failure);

    await expect(generatePortfolio(form, { complete, today })).rejects.toBe(failure);
  });
});
