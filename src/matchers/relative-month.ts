import { formatDate, monthBounds, withinCalendar } from "../format.js";
import { NUMERAL, chineseToNumber } from "../numeral.js";
import { type ParseContext, type ParsedTime, rangeResult } from "../types.js";

const NAMED_MONTHS: ReadonlyArray<readonly [string, number]> = [
  ["本月", 0],
  ["这个月", 0],
  ["上个月", -1],
  ["上月", -1],
  ["下个月", 1],
  ["下月", 1],
];

const MONTH_OFFSETS: ReadonlyArray<readonly [RegExp, number]> = [
  [new RegExp(`^${NUMERAL}个?月前`), -1],
  [new RegExp(`^${NUMERAL}个?月后`), 1],
];

/** 本月, 上个月, 三个月前 → first..last day of that month. */
export function matchRelativeMonth(expr: string, ctx: ParseContext): ParsedTime | null {
  const today = ctx.now.toPlainDate();

  for (const [name, offset] of NAMED_MONTHS) {
    if (expr.startsWith(name)) {
      const [first, last] = monthBounds(today, offset);
      return rangeResult(formatDate(first), formatDate(last), expr, 0.95);
    }
  }

  for (const [pattern, direction] of MONTH_OFFSETS) {
    const m = pattern.exec(expr);
    if (!m) continue;
    const offset = chineseToNumber(m[1]) * direction;
    const bounds = withinCalendar(() => monthBounds(today, offset));
    if (bounds === null) return null;
    return rangeResult(formatDate(bounds[0]), formatDate(bounds[1]), expr, 0.85);
  }

  return null;
}
