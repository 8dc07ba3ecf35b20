// Calendar helpers and output formatting.

import { Temporal } from "@js-temporal/polyfill";

type PD = Temporal.PlainDate;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD` */
export function formatDate(date: PD): string {
  return `${String(date.year).padStart(4, "0")}-${pad2(date.month)}-${pad2(date.day)}`;
}

/** `YYYY-MM-DD HH:mm:ss` */
export function formatDateTime(dt: Temporal.PlainDateTime): string {
  return `${formatDate(dt.toPlainDate())} ${pad2(dt.hour)}:${pad2(dt.minute)}:${pad2(dt.second)}`;
}

/** Monday of the week containing `date` (weeks start on Monday). */
export function mondayOf(date: PD): PD {
  return date.subtract({ days: date.dayOfWeek - 1 });
}

/** Monday and Sunday of the week `offsetWeeks` away from the one holding `date`. */
export function weekBounds(date: PD, offsetWeeks: number): [PD, PD] {
  const start = mondayOf(date).add({ weeks: offsetWeeks });
  return [start, start.add({ days: 6 })];
}

/** First and last day of the month `offsetMonths` away from the one holding `date`. */
export function monthBounds(date: PD, offsetMonths: number): [PD, PD] {
  const first = date.with({ day: 1 }).add({ months: offsetMonths });
  return [first, first.with({ day: first.daysInMonth })];
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Run calendar arithmetic that may leave Temporal's supported range
 * ("99999999天前"), returning `null` instead of a RangeError.
 */
export function withinCalendar<T>(compute: () => T): T | null {
  try {
    return compute();
  } catch (err) {
    if (err instanceof RangeError) return null;
    throw err;
  }
}
