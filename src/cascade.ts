// Dispatch: try each category in turn, first match wins.

import { formatDate } from "./format.js";
import { matchHoliday } from "./matchers/holiday.js";
import { matchRange } from "./matchers/range.js";
import { matchRelativeDay } from "./matchers/relative-day.js";
import { matchRelativeMonth } from "./matchers/relative-month.js";
import { matchRelativeWeek } from "./matchers/relative-week.js";
import { matchSpecificDate } from "./matchers/specific-date.js";
import { matchTimeOfDay } from "./matchers/time-of-day.js";
import { matchWeekday } from "./matchers/weekday.js";
import { type NamedMatcher, type ParseContext, type ParsedTime, pointResult } from "./types.js";

export const FALLBACK_CONFIDENCE = 0.3;

/**
 * Top-level order. Range goes first since its halves are themselves single
 * expressions; weekday precedes relative week so "上周三" is a day, not a week.
 */
export const CASCADE: readonly NamedMatcher[] = [
  { name: "range", match: matchRange },
  { name: "holiday", match: matchHoliday },
  { name: "relativeDay", match: matchRelativeDay },
  { name: "weekday", match: matchWeekday },
  { name: "relativeWeek", match: matchRelativeWeek },
  { name: "relativeMonth", match: matchRelativeMonth },
  { name: "timeOfDay", match: matchTimeOfDay },
  { name: "specificDate", match: matchSpecificDate },
];

/** Resolve a trimmed expression; falls back to today at confidence 0.3. */
export function resolve(expr: string, ctx: ParseContext): ParsedTime {
  for (const { name, match } of CASCADE) {
    const result = match(expr, ctx);
    if (result) {
      ctx.logger.debug(`'${expr}' matched ${name}`);
      return result;
    }
  }

  ctx.logger.debug(`'${expr}' matched nothing, using today`);
  return pointResult(formatDate(ctx.now.toPlainDate()), expr, FALLBACK_CONFIDENCE);
}
