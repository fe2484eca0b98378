/**
 * @tally/ledger — Calendar dates.
 *
 * Dates are naive local calendar days written as YYYY-MM-DD, and
 * timestamps are local wall-clock YYYY-MM-DD HH:MM:SS. There is no
 * timezone field anywhere; "today" is whatever the injected clock's
 * local date is.
 *
 * Day arithmetic runs on UTC day numbers so DST shifts never turn a
 * one-day gap into 23 or 25 hours.
 */

import type { Clock } from "./types.js";
import { LedgerError } from "./types.js";

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

export const MIN_YEAR = 1;
export const MAX_YEAR = 9999;

/** A validated calendar day. */
export interface CalendarDay {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/** First and last day of a month, both inclusive. */
export interface MonthBounds {
  readonly startDate: string;
  readonly endDate: string;
}

// ─── Parsing ─────────────────────────────────────────────────────────────

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

/**
 * Parse a strict YYYY-MM-DD string into a real calendar day.
 * Returns undefined for anything else ("2024-2-1", "2023-02-29", "").
 */
export function parseDate(value: string): CalendarDay | undefined {
  const match = DATE_PATTERN.exec(value);
  if (match === null) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (year < MIN_YEAR || month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;

  return { year, month, day };
}

export function isValidDate(value: string): boolean {
  return parseDate(value) !== undefined;
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

function dayNumber(day: CalendarDay): number {
  // setUTCFullYear keeps years below 100 literal, Date.UTC would map them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(day.year, day.month - 1, day.day);
  return Math.round(date.getTime() / MS_PER_DAY);
}

function requireDate(value: string): CalendarDay {
  const parsed = parseDate(value);
  if (parsed === undefined) {
    throw new LedgerError("INVALID_DATE", `Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return parsed;
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 * Throws INVALID_DATE if either side is not a valid date.
 */
export function daysBetween(from: string, to: string): number {
  return dayNumber(requireDate(to)) - dayNumber(requireDate(from));
}

/**
 * First and last day of a month.
 *
 * The last day is the day before the first of the following month, so
 * December rolls into January of the next year and February follows
 * the leap-year rule.
 */
export function monthBounds(year: number, month: number): MonthBounds {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new LedgerError("INVALID_DATE", `Year out of range: ${String(year)}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new LedgerError("INVALID_DATE", `Month out of range: ${String(month)}`);
  }

  const nextFirst = new Date(0);
  nextFirst.setUTCFullYear(month === 12 ? year + 1 : year, month === 12 ? 0 : month, 1);
  const last = new Date(nextFirst.getTime() - MS_PER_DAY);

  return {
    startDate: formatParts(year, month, 1),
    endDate: formatParts(last.getUTCFullYear(), last.getUTCMonth() + 1, last.getUTCDate()),
  };
}

// ─── Formatting ──────────────────────────────────────────────────────────

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function formatParts(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** Local calendar day of a Date as YYYY-MM-DD. */
export function formatDate(date: Date): string {
  return formatParts(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

/** Local wall-clock time of a Date as YYYY-MM-DD HH:MM:SS. */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function todayIn(clock: Clock): string {
  return formatDate(clock());
}

export const systemClock: Clock = () => new Date();
