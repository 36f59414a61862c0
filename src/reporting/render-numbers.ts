/**
 * Number formatting for metric reports.
 */

const SIG_FIGS = 3;
const PERC_DECIMALS = 1;

/**
 * Format a metric value for display.
 *
 * - Integers: grouped with commas
 * - Other finite values: at least 1 decimal place and at least 3 significant figures
 * - NaN and infinities: as JavaScript prints them
 */
export function renderNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  if (Number.isInteger(value)) {
    return formatFixed(value, 0);
  }
  const magnitude = Math.floor(Math.log10(Math.abs(value)));
  return formatFixed(value, Math.max(1, SIG_FIGS - 1 - magnitude));
}

/** Format a ratio in [0, 1] as a percentage. */
export function renderPercentage(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  return `${(value * 100).toFixed(PERC_DECIMALS)}%`;
}

function formatFixed(value: number, decimals: number): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });
}
