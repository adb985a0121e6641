/**
 * Whole units, thousands grouped with "." (e.g. $30.000).
 * Every monetary total in the app goes through here, CSV export included.
 */
export function formatMoney(amount: number): string {
  if (!Number.isFinite(amount)) return String(amount);
  return "$" + Math.round(amount).toLocaleString("en-US", { maximumFractionDigits: 0 }).replace(/,/g, ".");
}
