// Ranges: split on a separator, resolve each half on its own, join.

import {
  type NamedMatcher,
  type ParseContext,
  type ParsedTime,
  leadingValue,
  rangeResult,
} from "../types.js";
import { matchHoliday } from "./holiday.js";
import { matchRelativeDay } from "./relative-day.js";
import { matchRelativeMonth } from "./relative-month.js";
import { matchRelativeWeek } from "./relative-week.js";
import { matchSpecificDate } from "./specific-date.js";
import { matchTimeOfDay } from "./time-of-day.js";
import { matchWeekday } from "./weekday.js";

const SEPARATORS: readonly RegExp[] = [
  /^(.+?)到(.+)/,
  /^(.+?)至(.+)/,
  /^(.+?)-(.+)/,
  /^(.+?)~(.+)/,
  /^从(.+?)到(.+)/,
];

/**
 * Order for range halves. Weekday comes last: in "上周一到周五" the first
 * half resolves through the week table to that week's Monday.
 */
export const RANGE_HALF_MATCHERS: readonly NamedMatcher[] = [
  { name: "holiday", match: matchHoliday },
  { name: "relativeDay", match: matchRelativeDay },
  { name: "relativeWeek", match: matchRelativeWeek },
  { name: "relativeMonth", match: matchRelativeMonth },
  { name: "timeOfDay", match: matchTimeOfDay },
  { name: "specificDate", match: matchSpecificDate },
  { name: "weekday", match: matchWeekday },
];

interface RangeEnd {
  value: string;
  isDateOnly: boolean;
  confidence: number;
}

/** Resolve one half of a range to a single point. */
export function resolveRangeEnd(expr: string, ctx: ParseContext): RangeEnd | null {
  for (const { match } of RANGE_HALF_MATCHERS) {
    const result = match(expr, ctx);
    if (result) {
      return {
        value: leadingValue(result),
        isDateOnly: result.isDateOnly,
        confidence: result.confidence,
      };
    }
  }
  return null;
}

/** 昨天到今天, 1月1日至1月5日, 上午9点-10点, 从周一到周三 */
export function matchRange(expr: string, ctx: ParseContext): ParsedTime | null {
  for (const separator of SEPARATORS) {
    const m = separator.exec(expr);
    if (!m) continue;

    const start = resolveRangeEnd(m[1].trim(), ctx);
    const end = resolveRangeEnd(m[2].trim(), ctx);
    if (start && end) {
      return rangeResult(
        start.value,
        end.value,
        expr,
        Math.min(start.confidence, end.confidence),
        start.isDateOnly && end.isDateOnly,
      );
    }
  }
  return null;
}
