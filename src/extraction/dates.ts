// src/extraction/dates.ts
// Date parsing and elapsed-time helpers for computed fields.

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

/** Date instance or ISO-like string; null for anything else */
export function parseDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === "string" && ISO_DATE_PREFIX.test(value)) {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

/** Whole days between two instants, ignoring direction */
export function diffInDays(from: Date, to: Date): number {
  return Math.floor(Math.abs(to.getTime() - from.getTime()) / DAY_MS);
}

/** Whole calendar months between two instants (UTC), ignoring direction */
export function diffInMonths(from: Date, to: Date): number {
  const [start, end] = from <= to ? [from, to] : [to, from];
  let months =
    (end.getUTCFullYear() - start.getUTCFullYear()) * 12 +
    (end.getUTCMonth() - start.getUTCMonth());

  // Partial month does not count
  const startRest = start.getTime() - Date.UTC(start.getUTCFullYear(), start.getUTCMonth(), 1);
  const endRest = end.getTime() - Date.UTC(end.getUTCFullYear(), end.getUTCMonth(), 1);
  if (endRest < startRest) months -= 1;

  return Math.max(0, months);
}

export function diffInYears(from: Date, to: Date): number {
  return Math.floor(diffInMonths(from, to) / 12);
}

/** Days from `date` until `now`; negative for future dates */
export function daysAgo(date: Date, now: Date): number {
  return Math.floor((now.getTime() - date.getTime()) / DAY_MS);
}
