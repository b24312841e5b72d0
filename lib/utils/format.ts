/**
 * Format numbers for display.
 */
const CURRENCY_FORMAT = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatCurrency(amount: number): string {
  return CURRENCY_FORMAT.format(amount);
}

/** Billions with one decimal, e.g. 12.3 -> "$12.3bn". Sign is kept. */
export function formatBillions(amount: number): string {
  const sign = amount < 0 ? "-" : "";
  return `${sign}$${Math.abs(amount).toFixed(1)}bn`;
}

/** Decimal fraction as a percent, e.g. 0.85 -> "85%". */
export function formatPercent(rate: number): string {
  return `${Math.round(rate * 1000) / 10}%`;
}

/** Insert thousands separators into a typed amount, keeping any decimal part. */
export function formatWithCommas(value: string): string {
  if (value === "") return value;
  const cleaned = value.replace(/[^0-9.]/g, "");
  const [intPart = "", decPart] = cleaned.split(".");
  const formatted = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return formatted + (decPart !== undefined ? "." + decPart : "");
}

/** Parse a typed amount ("52,000" -> 52000). Null when nothing numeric was typed. */
export function parseAmount(value: string): number | null {
  const n = parseFloat(value.replace(/,/g, ""));
  return Number.isFinite(n) ? n : null;
}
