// api/src/common/utils/time.utils.ts

const DAY_MS = 86_400_000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a YYYY-MM-DD date as midnight UTC.
 */
export function parseDateUTC(date: string): Date {
  if (!ISO_DATE.test(date)) throw new RangeError(`Invalid ISO date: ${date}`);
  const d = new Date(`${date}T00:00:00Z`);
  if (Number.isNaN(d.getTime())) throw new RangeError(`Invalid ISO date: ${date}`);
  return d;
}

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  return !Number.isNaN(new Date(`${value}T00:00:00Z`).getTime());
}

/**
 * Format a Date as its UTC calendar day (YYYY-MM-DD).
 */
export function toISODate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/**
 * Add whole calendar days to a YYYY-MM-DD date.
 */
export function addDays(date: string, n: number): string {
  return toISODate(new Date(parseDateUTC(date).getTime() + n * DAY_MS));
}

/**
 * Today's UTC calendar day.
 */
export function todayUTC(now: Date = new Date()): string {
  return toISODate(now);
}

/**
 * Unix seconds at midnight UTC of a YYYY-MM-DD date.
 */
export function toUnixSeconds(date: string): number {
  return Math.floor(parseDateUTC(date).getTime() / 1000);
}

/**
 * Calendar day of a unix timestamp after shifting it by an offset in seconds
 * (exchange-local day for provider timestamps).
 */
export function unixToISODate(seconds: number, offsetSeconds = 0): string {
  return toISODate(new Date((seconds + offsetSeconds) * 1000));
}
