import { Temporal } from "@js-temporal/polyfill";
import { formatDate, withinCalendar } from "../format.js";
import { type ParseContext, type ParsedTime, pointResult } from "../types.js";

interface DateFields {
  year: number;
  month: number;
  day: number;
}

type DatePattern = readonly [RegExp, (m: RegExpExecArray, now: Temporal.ZonedDateTime) => DateFields];

// Most specific first; a pattern whose numbers do not form a real date is
// skipped and the next one is tried.
const DATE_PATTERNS: readonly DatePattern[] = [
  [
    /^(\d{4})年(\d{1,2})月(\d{1,2})[日号]?/,
    (m) => ({ year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) }),
  ],
  [
    /^(\d{1,2})月(\d{1,2})[日号]?/,
    (m, now) => ({ year: now.year, month: Number(m[1]), day: Number(m[2]) }),
  ],
  [
    /^(\d{1,2})[日号]/,
    (m, now) => ({ year: now.year, month: now.month, day: Number(m[1]) }),
  ],
];

/** 2024年1月1日, 1月20号, 15日 */
export function matchSpecificDate(expr: string, ctx: ParseContext): ParsedTime | null {
  for (const [pattern, fields] of DATE_PATTERNS) {
    const m = pattern.exec(expr);
    if (!m) continue;
    const date = withinCalendar(() =>
      Temporal.PlainDate.from(fields(m, ctx.now), { overflow: "reject" }),
    );
    if (date !== null) {
      return pointResult(formatDate(date), expr, 1.0);
    }
  }
  return null;
}
