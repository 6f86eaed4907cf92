export const TIMEFRAMES = ["MTD", "QTD", "YTD", "1Y", "5Y", "CUSTOM"] as const;

export type Timeframe = (typeof TIMEFRAMES)[number];

export const TIMEFRAME_OPTIONS: { value: Timeframe; label: string }[] = [
  { value: "MTD", label: "MTD" },
  { value: "QTD", label: "QTD" },
  { value: "YTD", label: "YTD" },
  { value: "1Y", label: "1Y" },
  { value: "5Y", label: "5Y" },
  { value: "CUSTOM", label: "Since Custom Date" },
];

const DAY_MS = 24 * 60 * 60 * 1000;

export function isTimeframe(value: unknown): value is Timeframe {
  return TIMEFRAMES.some((t) => t === value);
}

export function formatDateUTC(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Midnight UTC of the given instant's calendar day. */
export function startOfDayUTC(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}

/** Parses a strict `YYYY-MM-DD` string; null for anything else, including 2025-02-30. */
export function parseIsoDate(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const d = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(d.getTime()) || formatDateUTC(d) !== value) return null;
  return d;
}

export function daysBetween(from: Date, to: Date): number {
  return Math.round((startOfDayUTC(to).getTime() - startOfDayUTC(from).getTime()) / DAY_MS);
}

/** The form's default custom start: one year before today. */
export function defaultCustomStartDate(today: Date): string {
  return formatDateUTC(new Date(startOfDayUTC(today).getTime() - 365 * DAY_MS));
}

/**
 * Number of days of synthetic history to draw for a timeframe. Never below 1,
 * so the first day of a month or quarter still yields a point.
 */
export function resolveTimeframeDays(
  timeframe: Timeframe,
  today: Date,
  customStartDate?: string,
): number {
  const y = today.getUTCFullYear();
  const m = today.getUTCMonth();

  let days: number;
  switch (timeframe) {
    case "MTD":
      days = daysBetween(new Date(Date.UTC(y, m, 1)), today);
      break;
    case "QTD":
      days = daysBetween(new Date(Date.UTC(y, 3 * Math.floor(m / 3), 1)), today);
      break;
    case "YTD":
      days = daysBetween(new Date(Date.UTC(y, 0, 1)), today);
      break;
    case "1Y":
      days = 365;
      break;
    case "5Y":
      days = 365 * 5;
      break;
    case "CUSTOM": {
      const start = customStartDate ? parseIsoDate(customStartDate) : null;
      days = start ? daysBetween(start, today) : 365;
      break;
    }
  }

  return Math.max(days, 1);
}
