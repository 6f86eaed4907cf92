import { type SimulatedSeries, simulatePerformance } from "@/lib/simulation";
import { type Timeframe, resolveTimeframeDays } from "@/lib/timeframe";

import { parsePortfolioResponse } from "./parse";
import { buildPortfolioPrompt } from "./prompt";
import { type ThesisFormValues, validateThesisForm } from "./request";
import type { AssetAllocation } from "./schema";

export type CompleteFn = (prompt: string, apiKey: string) => Promise<string>;

export type GeneratedPortfolio = {
  portfolio: AssetAllocation[];
  overallJustification: string;
  normalized: boolean;
  originalTotal: number;
  timeframe: Timeframe;
  days: number;
  performance: SimulatedSeries;
  rawCompletion: string;
};

export type GenerateDeps = {
  complete: CompleteFn;
  today?: Date;
  random?: () => number;
};

/**
 * form → ThesisRequest → prompt → completion → validated portfolio → chart.
 * Fails with a PortfolioError at the first broken step; nothing partial is
 * returned.
 */
export async function generatePortfolio(
  values: ThesisFormValues,
  { complete, today = new Date(), random = Math.random }: GenerateDeps,
): Promise<GeneratedPortfolio> {
  const { request, credentials } = validateThesisForm(values, today);

  const rawCompletion = await complete(buildPortfolioPrompt(request.thesis), credentials.llmApiKey);
  const { response, normalized, originalTotal } = parsePortfolioResponse(rawCompletion);

  const days = resolveTimeframeDays(request.timeframe, today, request.customStartDate);

  return {
    portfolio: response.portfolio,
    overallJustification: response.overallJustification,
    normalized,
    originalTotal,
    timeframe: request.timeframe,
    days,
    performance: simulatePerformance(days, today, random),
    rawCompletion,
  };
}
