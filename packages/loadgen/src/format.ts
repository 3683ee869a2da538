/**
 * Elapsed time in compact unit form: `850ms`, `3.002s`, `1m5.5s`, `2h0m1s`.
 * Rounded to the millisecond.
 */
export function formatDuration(ms: number): string {
  const rounded = Math.max(0, Math.round(ms));
  if (rounded < 1_000) {
    return `${rounded}ms`;
  }

  const hours = Math.floor(rounded / 3_600_000);
  const minutes = Math.floor((rounded % 3_600_000) / 60_000);
  const seconds = Number(((rounded % 60_000) / 1_000).toFixed(3));

  const h = hours > 0 ? `${hours}h` : "";
  const m = hours > 0 || minutes > 0 ? `${minutes}m` : "";
  return `${h}${m}${seconds}s`;
}
