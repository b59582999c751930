/**
 * Calendar validation for yyyy-MM-dd dates as they appear on task lines.
 * Years 0000-9999 are accepted; February 29 follows the Gregorian leap rule.
 */

import type { IsoDate } from '../types/todo.js';

/** yyyy-MM-dd pattern */
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Number of days in a 1-based month, or 0 for a month outside 1-12 */
export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  return Number.isInteger(day) && day >= 1 && day <= daysInMonth(year, month);
}

/**
 * Validate a yyyy-MM-dd string. Returns the input unchanged when it names a
 * real calendar day, null otherwise (e.g. 2021-02-29, 2021-13-01).
 */
export function parseIsoDate(input: string): IsoDate | null {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return null;

  const year = parseInt(m[1]!, 10);
  const month = parseInt(m[2]!, 10);
  const day = parseInt(m[3]!, 10);
  return isValidCalendarDate(year, month, day) ? input : null;
}

/** Format a Date as yyyy-MM-dd in local time */
export function formatDate(d: Date): IsoDate {
  const y = String(d.getFullYear()).padStart(4, '0');
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}
