// src/domain/dateUtils.ts
import type { ISODate } from "./types";

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
* Convert a Date (UTC) to ISODate "YYYY-MM-DD".
*/
export function toISODate(date: Date): ISODate {
  const year = date.getUTCFullYear();
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Parse an ISODate "YYYY-MM-DD" into a Date (UTC midnight).
 */
export function parseISODate(iso: ISODate): Date {
  const [y, m, d] = iso.split("-").map((s) => parseInt(s, 10));
  return new Date(Date.UTC(y, m - 1, d));
}

/**
 * True if 'iso' is a well-formed "YYYY-MM-DD" naming a real calendar day.
 */
export function isValidISODate(iso: string): boolean {
  if (!ISO_DATE_PATTERN.test(iso)) return false;
  return toISODate(parseISODate(iso)) === iso;
}

/**
 * Move 'months' calendar months forward, clamping the day to the end of the
 * target month (Jan 31 + 1 month = Feb 28/29).
 */
export function addMonthsUTC(date: Date, months: number): Date {
  const y = date.getUTCFullYear();
  const m = date.getUTCMonth();
  const d = date.getUTCDate();

  const base = new Date(Date.UTC(y, m + months, 1));
  const baseYear = base.getUTCFullYear();
  const baseMonth = base.getUTCMonth();

  const lastDay = new Date(
    Date.UTC(baseYear, baseMonth + 1, 0)
  ).getUTCDate();

  const safeDay = Math.min(d, lastDay);
  return new Date(Date.UTC(baseYear, baseMonth, safeDay));
}

export function addMonths(base: ISODate, offset: number): ISODate {
  return toISODate(addMonthsUTC(parseISODate(base), offset));
}
