export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Calendar day (UTC) of an instant, as YYYY-MM-DD
 */
export function toIsoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function elapsedDays(from: Date, now: Date): number {
  return (now.getTime() - from.getTime()) / MS_PER_DAY;
}

/**
 * Parse a date string from a feed or a stored document. Invalid input yields undefined.
 */
export function parseDate(value: string | undefined | null): Date | undefined {
  if (!value) return undefined;

  const parsed = new Date(value);
  return isNaN(parsed.getTime()) ? undefined : parsed;
}

/**
 * Epoch milliseconds for sorting; unparseable timestamps sort as the oldest.
 */
export function timestampMillis(timestamp: string): number {
  const millis = Date.parse(timestamp);
  return isNaN(millis) ? Number.NEGATIVE_INFINITY : millis;
}

/**
 * Human-readable local time used in run log lines
 */
export function formatLogTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
