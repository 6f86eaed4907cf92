import {
  type Timeframe,
  daysBetween,
  isTimeframe,
  parseIsoDate,
} from "@/lib/timeframe";

import { PortfolioError } from "./errors";

export type ThesisFormValues = {
  thesis: string;
  llmApiKey: string;
  marketDataApiKey: string;
  timeframe: string;
  customStartDate?: string;
};

export type ThesisRequest = {
  thesis: string;
  timeframe: Timeframe;
  customStartDate?: string;
};

// Opaque; handed to the completion client untouched. The market-data key is
// collected for parity with the form but nothing reads it.
export type Credentials = {
  llmApiKey: string;
  marketDataApiKey: string;
};

const REQUIRED_FIELDS: { key: "thesis" | "llmApiKey" | "marketDataApiKey"; label: string }[] = [
  { key: "thesis", label: "investment thesis" },
  { key: "llmApiKey", label: "LLM API key" },
  { key: "marketDataApiKey", label: "market data API key" },
];

function stringField(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  return typeof value === "string" ? value : "";
}

/** Reads form values out of an untrusted JSON body; non-string fields read as empty. */
export function coerceFormValues(body: unknown): ThesisFormValues {
  const source: Record<string, unknown> =
    body !== null && typeof body === "object" && !Array.isArray(body)
      ? Object.fromEntries(Object.entries(body))
      : {};

  const customStartDate = stringField(source, "customStartDate");
  return {
    thesis: stringField(source, "thesis"),
    llmApiKey: stringField(source, "llmApiKey"),
    marketDataApiKey: stringField(source, "marketDataApiKey"),
    timeframe: stringField(source, "timeframe"),
    ...(customStartDate ? { customStartDate } : {}),
  };
}

/**
 * Checks the submitted form before anything leaves the process. Throws
 * `MissingInput` listing the offending fields.
 */
export function validateThesisForm(
  values: ThesisFormValues,
  today: Date = new Date(),
): { request: ThesisRequest; credentials: Credentials } {
  const empty = REQUIRED_FIELDS.filter(({ key }) => !values[key].trim());
  if (empty.length) {
    throw new PortfolioError(
      "MissingInput",
      `Please provide all required fields: ${empty.map((f) => f.label).join(", ")}.`,
      { fields: empty.map((f) => f.key) },
    );
  }

  if (!isTimeframe(values.timeframe)) {
    throw new PortfolioError("MissingInput", "Please select a performance view range.", {
      fields: ["timeframe"],
    });
  }

  const request: ThesisRequest = {
    thesis: values.thesis,
    timeframe: values.timeframe,
  };

  if (values.timeframe === "CUSTOM") {
    const raw = values.customStartDate?.trim() ?? "";
    const start = raw ? parseIsoDate(raw) : null;
    if (!start) {
      throw new PortfolioError("MissingInput", "Please select a custom start date.", {
        fields: ["customStartDate"],
      });
    }
    if (daysBetween(start, today) < 1) {
      throw new PortfolioError("MissingInput", "Custom start date must be before today.", {
        fields: ["customStartDate"],
      });
    }
    request.customStartDate = raw;
  }

  return {
    request,
    credentials: {
      llmApiKey: values.llmApiKey,
      marketDataApiKey: values.marketDataApiKey,
    },
  };
}
