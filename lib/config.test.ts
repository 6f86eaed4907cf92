import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults on an empty environment", () => {
    expect(loadConfig({})).toEqual({
      model: "gpt-3.5-turbo",
      timeoutMs: 60000,
      baseURL: undefined,
    });
  });

  it("reads overrides and coerces the timeout", () => {
    const config = loadConfig({
      PORTFOLIO_MODEL: "gpt-4o-mini",
      COMPLETION_TIMEOUT_MS: "15000",
      OPENAI_BASE_URL: "http://localhost:4010/v1",
    });
    expect(config).toEqual({
      model: "gpt-4o-mini",
      timeoutMs: 15000,
      baseURL: "http://localhost:4010/v1",
    });
  });

  it("rejects a non-positive timeout", () => {
    expect(() => loadConfig({ COMPLETION_TIMEOUT_MS: "-5" })).toThrow(
      /Invalid configuration: COMPLETION_TIMEOUT_MS/,
    );
  });
});
