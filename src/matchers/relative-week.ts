import { formatDate, weekBounds, withinCalendar } from "../format.js";
import { NUMERAL, chineseToNumber } from "../numeral.js";
import { type ParseContext, type ParsedTime, rangeResult } from "../types.js";

const NAMED_WEEKS: ReadonlyArray<readonly [string, number]> = [
  ["本周", 0],
  ["这周", 0],
  ["上周", -1],
  ["上一周", -1],
  ["上上周", -2],
  ["下周", 1],
  ["下一周", 1],
  ["下下周", 2],
];

const WEEK_OFFSETS: ReadonlyArray<readonly [RegExp, number]> = [
  [new RegExp(`^${NUMERAL}周前`), -1],
  [new RegExp(`^${NUMERAL}周后`), 1],
  [new RegExp(`^${NUMERAL}个?星期前`), -1],
  [new RegExp(`^${NUMERAL}个?星期后`), 1],
];

/** 本周, 上上周, 两周前, 3个星期后 → Monday..Sunday of that week. */
export function matchRelativeWeek(expr: string, ctx: ParseContext): ParsedTime | null {
  const today = ctx.now.toPlainDate();

  for (const [name, offset] of NAMED_WEEKS) {
    if (expr.startsWith(name)) {
      const [start, end] = weekBounds(today, offset);
      return rangeResult(formatDate(start), formatDate(end), expr, 0.95);
    }
  }

  for (const [pattern, direction] of WEEK_OFFSETS) {
    const m = pattern.exec(expr);
    if (!m) continue;
    const offset = chineseToNumber(m[1]) * direction;
    const bounds = withinCalendar(() => weekBounds(today, offset));
    if (bounds === null) return null;
    return rangeResult(formatDate(bounds[0]), formatDate(bounds[1]), expr, 0.9);
  }

  return null;
}
