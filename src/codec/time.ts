/**
 * Text forms of durations and timestamps.
 */

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

/**
 * RFC 3339 in UTC with the fractional second trimmed of trailing zeros,
 * e.g. `1970-01-01T00:00:00Z` or `1970-01-01T00:00:00.001Z`.
 */
export function formatRfc3339(value: Date): string {
  if (Number.isNaN(value.getTime())) return "Invalid Date";
  return value
    .toISOString()
    .replace(/\.(\d*?)0+Z$/, (_match, digits: string) => (digits.length > 0 ? `.${digits}Z` : "Z"));
}

/**
 * Human readable duration: `0`, `250ms`, `1.5s`, `2m3s`, `1h0m5s`.
 */
export function formatDuration(ms: number): string {
  if (ms === 0) return "0";
  if (ms < 0) return `-${formatDuration(-ms)}`;
  if (ms < MS_PER_SECOND) return `${ms}ms`;

  const hours = Math.floor(ms / MS_PER_HOUR);
  const minutes = Math.floor((ms % MS_PER_HOUR) / MS_PER_MINUTE);
  const seconds = (ms % MS_PER_MINUTE) / MS_PER_SECOND;

  let out = "";
  if (hours > 0) out += `${hours}h`;
  if (hours > 0 || minutes > 0) out += `${minutes}m`;
  if (seconds > 0) out += `${Number(seconds.toFixed(3))}s`;
  return out;
}
