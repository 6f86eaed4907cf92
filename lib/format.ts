export function isFiniteNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

/** Formats a value already expressed in percent (0-100). */
export function fmtPct(x: unknown, digits = 2) {
  if (!isFiniteNumber(x)) return "—";
  return `${x.toFixed(digits)}%`;
}

export function fmtDollars(x: unknown, digits = 2) {
  if (!isFiniteNumber(x)) return "—";
  return x.toLocaleString("en-US", {
    style: "currency",
    currency: "USD",
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  });
}
