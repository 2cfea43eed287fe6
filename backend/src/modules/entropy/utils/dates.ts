/**
 * Trading-day helpers. All dates are UTC calendar days as YYYY-MM-DD.
 */

import type { DateRange } from '../entropy.types.js';

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

export function isValidDate(dateStr: string): boolean {
  if (!DATE_RE.test(dateStr)) return false;
  const [y, m, d] = dateStr.split('-').map(Number);
  const date = new Date(Date.UTC(y, m - 1, d));
  return date.getUTCFullYear() === y && date.getUTCMonth() === m - 1 && date.getUTCDate() === d;
}

export function toUtcMs(dateStr: string): number {
  const [y, m, d] = dateStr.split('-').map(Number);
  return Date.UTC(y, m - 1, d);
}

export function fromUtcMs(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** 0 = Sunday … 6 = Saturday */
export function weekday(dateStr: string): number {
  return new Date(toUtcMs(dateStr)).getUTCDay();
}

export function inRange(date: string, range: DateRange): boolean {
  return date >= range.from && date <= range.to;
}

/**
 * Monday–Friday calendar between two dates (inclusive).
 */
export function businessDays(range: DateRange): string[] {
  const out: string[] = [];
  const end = toUtcMs(range.to);
  for (let t = toUtcMs(range.from); t <= end; t += DAY_MS) {
    const day = new Date(t).getUTCDay();
    if (day !== 0 && day !== 6) out.push(fromUtcMs(t));
  }
  return out;
}

export function formatRange(range: DateRange): string {
  return `${range.from}_${range.to}`;
}
