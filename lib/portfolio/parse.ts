import { z } from "zod";

import { PortfolioError } from "./errors";
import {
  type AssetAllocation,
  type NormalizedPortfolio,
  PortfolioResponseSchema,
} from "./schema";

/** Deviation from 100 (in percentage points) tolerated without a rescale. */
export const ALLOCATION_TOLERANCE = 0.1;

function formatPath(path: (string | number)[]): string {
  return path.reduce<string>((out, segment) => {
    if (typeof segment === "number") return `${out}[${segment}]`;
    return out ? `${out}.${segment}` : segment;
  }, "");
}

function isMissingKey(issue: z.ZodIssue): boolean {
  return (
    issue.code === z.ZodIssueCode.invalid_type &&
    issue.received === z.ZodParsedType.undefined &&
    issue.path.length > 0
  );
}

function sumAllocations(portfolio: AssetAllocation[]): number {
  return portfolio.reduce((total, asset) => total + asset.allocation, 0);
}

/**
 * Rescales allocations proportionally so they sum to 100. Allocations that
 * are already within {@link ALLOCATION_TOLERANCE} of 100 are returned as-is.
 */
export function normalizeAllocations(
  portfolio: AssetAllocation[],
  raw?: string,
): {
  portfolio: AssetAllocation[];
  normalized: boolean;
  total: number;
} {
  const total = sumAllocations(portfolio);

  if (!(total > 0) || !Number.isFinite(total)) {
    throw new PortfolioError(
      "MalformedResponse",
      `Total allocation must be a positive number, got ${total}.`,
      { raw },
    );
  }

  if (Math.abs(total - 100) <= ALLOCATION_TOLERANCE) {
    return { portfolio, normalized: false, total };
  }

  return {
    portfolio: portfolio.map((asset) => ({
      ...asset,
      allocation: (asset.allocation / total) * 100,
    })),
    normalized: true,
    total,
  };
}

/**
 * Turns raw completion text into a validated, allocation-normalized
 * portfolio. Throws `PortfolioError` with kind `MalformedResponse` or
 * `MissingField`.
 */
export function parsePortfolioResponse(text: string): NormalizedPortfolio {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new PortfolioError(
      "MalformedResponse",
      "Model response is not valid JSON.",
      { raw: text, cause: error },
    );
  }

  const result = PortfolioResponseSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues;
    const missing = issues.find(isMissingKey);

    if (missing) {
      const key = missing.path[missing.path.length - 1];
      const path = formatPath(missing.path);
      throw new PortfolioError(
        "MissingField",
        `Model response is missing required field "${path}".`,
        { field: String(key), path },
      );
    }

    const [first] = issues;
    const where = first && first.path.length ? ` at "${formatPath(first.path)}"` : "";
    throw new PortfolioError(
      "MalformedResponse",
      `Model response has an unexpected shape${where}: ${first?.message ?? "invalid"}.`,
      { raw: text },
    );
  }

  const { portfolio, normalized, total } = normalizeAllocations(
    result.data.portfolio,
    text,
  );

  return {
    response: { ...result.data, portfolio },
    normalized,
    originalTotal: total,
  };
}
