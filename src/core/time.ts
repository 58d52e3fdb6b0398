/**
 * Time utilities for consistent date handling
 * Dates travel through the pipeline as `yyyy-MM-dd` strings
 */

import { addDays, differenceInCalendarDays, format, isValid, parse } from 'date-fns';

const ISO_DATE = 'yyyy-MM-dd';
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): string {
  return format(date, ISO_DATE);
}

/** Strict calendar date parse; `2025-02-30` is rejected. */
export function parseIsoDate(dateStr: string): Date | null {
  if (!ISO_DATE_PATTERN.test(dateStr)) return null;
  const parsed = parse(dateStr, ISO_DATE, new Date(0));
  if (!isValid(parsed) || formatDate(parsed) !== dateStr) return null;
  return parsed;
}

export function isIsoDate(dateStr: string): boolean {
  return parseIsoDate(dateStr) !== null;
}

export function addCalendarDays(dateStr: string, days: number): string | null {
  const parsed = parseIsoDate(dateStr);
  return parsed ? formatDate(addDays(parsed, days)) : null;
}

/** `later - earlier` in calendar days, or null when either date is malformed. */
export function calendarDaysBetween(later: string, earlier: string): number | null {
  const a = parseIsoDate(later);
  const b = parseIsoDate(earlier);
  if (!a || !b) return null;
  return differenceInCalendarDays(a, b);
}
