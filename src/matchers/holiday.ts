// Holidays: fixed solar dates, lunar dates via the injected calendar, and
// Qingming.

import { Temporal } from "@js-temporal/polyfill";
import { formatDate, isLeapYear } from "../format.js";
import { holidayTable } from "../holidays.js";
import { type ParseContext, type ParsedTime, pointResult, rangeResult } from "../types.js";

const HOLIDAY_CONFIDENCE = 0.95;

export function matchHoliday(expr: string, ctx: ParseContext): ParsedTime | null {
  const table = holidayTable();
  const year = ctx.now.year;
  const marked = expr.includes(table.periodMarker);

  for (const holiday of table.solar) {
    if (!expr.includes(holiday.name)) continue;
    const date = Temporal.PlainDate.from({ year, month: holiday.month, day: holiday.day });
    return holidayResult(date, holiday.days, marked, expr);
  }

  for (const holiday of table.lunar) {
    if (!expr.includes(holiday.name)) continue;
    const converted = ctx.lunar.toSolar(year, holiday.month, holiday.day);
    if (converted.ok) {
      return holidayResult(converted.date, holiday.days, marked, expr);
    }
    ctx.logger.warn(`lunar holiday '${holiday.name}' skipped: ${converted.reason}`);
  }

  const { qingming } = table;
  if (qingming.names.some((name) => expr.includes(name))) {
    // Solar-term date approximated: April 4 in leap years, April 5 otherwise.
    const date = Temporal.PlainDate.from({ year, month: 4, day: isLeapYear(year) ? 4 : 5 });
    return holidayResult(date, marked ? qingming.periodDays : qingming.days, marked, expr);
  }

  return null;
}

function holidayResult(
  start: Temporal.PlainDate,
  days: number,
  marked: boolean,
  expr: string,
): ParsedTime {
  if (days > 1 || marked) {
    const end = start.add({ days: days - 1 });
    return rangeResult(formatDate(start), formatDate(end), expr, HOLIDAY_CONFIDENCE);
  }
  return pointResult(formatDate(start), expr, HOLIDAY_CONFIDENCE);
}
