import { describe, it, expect } from "vitest";
import { fmtDollars, fmtPct } from "./format";

describe("format helpers", () => {
  it("formats percentages", () => {
    expect(fmtPct(33.3333)).toBe("33.33%");
    expect(fmtPct(50, 0)).toBe("50%");
    expect(fmtPct(Number.NaN)).toBe("—");
  });

  it("formats dollars", () => {
    expect(fmtDollars(10012.5)).toBe("$10,012.50");
    expect(fmtDollars(9876.555, 0)).toBe("$9,877");
    expect(fmtDollars(undefined)).toBe("—");
  });
});
