export const STARTING_CAPITAL = 10_000;

const THESIS_PLACEHOLDER = "{{thesis}}";

export const PORTFOLIO_PROMPT_TEMPLATE = `Please respond with a json object only. Do not include any introductory or concluding text, just the raw json. You are a financial advisor. Based on the following investment thesis, generate a diversified investment portfolio suitable for a starting capital of $${STARTING_CAPITAL.toLocaleString("en-US")}.
The portfolio should consist of 10-15 assets, with approximately 70% allocation to ETFs and 30% to individual stocks or bonds.
For each asset, provide its ticker symbol, a proposed percentage allocation (summing to 100%), and a brief justification for its inclusion based on the investment thesis.
Additionally, provide an overall justification for the portfolio strategy.
The json object should have two top-level keys: 'portfolio' (an array of asset objects) and 'overallJustification' (a string).
Each asset object in the 'portfolio' array should have 'symbol' (string), 'name' (string), 'allocation' (number), and 'justification' (string).

Investment Thesis: "${THESIS_PLACEHOLDER}"`;

/** Embeds the thesis verbatim; no escaping or trimming. */
export function buildPortfolioPrompt(thesis: string): string {
  return PORTFOLIO_PROMPT_TEMPLATE.replace(THESIS_PLACEHOLDER, () => thesis);
}
