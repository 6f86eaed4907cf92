import { formatDateUTC, startOfDayUTC } from "./timeframe";

export const SIMULATION_BASE_VALUE = 10_000;
export const PORTFOLIO_DAILY_STEP = 10;
export const BENCHMARK_DAILY_STEP = 8;

export type SeriesName = "Portfolio" | "Benchmark";

export type SimulatedSeries = {
  labels: string[];
  series: Record<SeriesName, number[]>;
};

const DAY_MS = 24 * 60 * 60 * 1000;

// Standard normal draw (Box-Muller). 1 - u keeps the log argument in (0, 1].
function normal(random: () => number): number {
  const u1 = 1 - random();
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

function randomWalk(days: number, step: number, random: () => number): number[] {
  const values: number[] = [];
  let level = SIMULATION_BASE_VALUE;
  for (let i = 0; i < days; i++) {
    level += normal(random) * step;
    values.push(level);
  }
  return values;
}

/**
 * Decorative performance lines: two independent random walks anchored at
 * 10,000 over the `days` calendar days ending today. They carry no
 * information about the portfolio itself.
 */
export function simulatePerformance(
  days: number,
  today: Date,
  random: () => number = Math.random,
): SimulatedSeries {
  const count = Math.max(Math.floor(days), 0);
  const end = startOfDayUTC(today).getTime();

  const labels: string[] = [];
  for (let i = count - 1; i >= 0; i--) {
    labels.push(formatDateUTC(new Date(end - i * DAY_MS)));
  }

  return {
    labels,
    series: {
      Portfolio: randomWalk(count, PORTFOLIO_DAILY_STEP, random),
      Benchmark: randomWalk(count, BENCHMARK_DAILY_STEP, random),
    },
  };
}
