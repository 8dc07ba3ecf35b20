import { formatDate, mondayOf } from "../format.js";
import { type ParseContext, type ParsedTime, pointResult } from "../types.js";

/** Days after Monday. */
const WEEKDAY_INDEX: Readonly<Record<string, number>> = {
  一: 0,
  二: 1,
  三: 2,
  四: 3,
  五: 4,
  六: 5,
  日: 6,
  天: 6,
};

const WEEK_PREFIX: Readonly<Record<string, number>> = {
  这: 0,
  上: -1,
  上上: -2,
  下: 1,
  下下: 2,
};

const WEEKDAY_PATTERN = /^(上上|上|下下|下|这)?(?:周|星期)([一二三四五六日天])/;

/** 周三, 上周五, 下下星期天 → that day in the current, previous or following weeks. */
export function matchWeekday(expr: string, ctx: ParseContext): ParsedTime | null {
  const m = WEEKDAY_PATTERN.exec(expr);
  if (!m) return null;

  const weeks = m[1] === undefined ? 0 : (WEEK_PREFIX[m[1]] ?? 0);
  const index = WEEKDAY_INDEX[m[2]] ?? 0;
  // One signed day count: Temporal rejects durations whose fields differ in sign.
  const target = mondayOf(ctx.now.toPlainDate()).add({ days: index + weeks * 7 });
  return pointResult(formatDate(target), expr, 0.95);
}
