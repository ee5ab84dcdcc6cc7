/**
 * Calendar date helpers. All dates are local calendar dates, matching what
 * an analyst reading the report on the same machine would expect.
 *
 * @module date-range
 */

import type { DateRange } from "./types";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** YYYY-MM-DD */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** YYYY-MM-DD HH:MM:SS */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Shift by whole calendar days. Goes through the date constructor rather than
 * millisecond arithmetic so DST transitions never skip or repeat a day.
 */
export function shiftDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days, 12, 0, 0);
}

export function computeDateRange(now: Date, days: number): DateRange {
  return {
    start: formatDate(shiftDays(now, -days)),
    end: formatDate(now),
  };
}

export function isWithinRange(date: string, range: DateRange): boolean {
  return date >= range.start && date <= range.end;
}
