import { formatDate, withinCalendar } from "../format.js";
import { NUMERAL, chineseToNumber } from "../numeral.js";
import { type ParseContext, type ParsedTime, pointResult } from "../types.js";

const NAMED_DAYS: ReadonlyArray<readonly [string, number]> = [
  ["今天", 0],
  ["今日", 0],
  ["昨天", -1],
  ["昨日", -1],
  ["前天", -2],
  ["前日", -2],
  ["大前天", -3],
  ["明天", 1],
  ["明日", 1],
  ["后天", 2],
  ["后日", 2],
  ["大后天", 3],
];

const DAY_OFFSETS: ReadonlyArray<readonly [RegExp, number]> = [
  [new RegExp(`^${NUMERAL}天前`), -1],
  [new RegExp(`^${NUMERAL}天后`), 1],
  [new RegExp(`^${NUMERAL}日前`), -1],
  [new RegExp(`^${NUMERAL}日后`), 1],
];

/** 今天, 大前天, 三天前, 10日后 */
export function matchRelativeDay(expr: string, ctx: ParseContext): ParsedTime | null {
  const today = ctx.now.toPlainDate();

  for (const [name, offset] of NAMED_DAYS) {
    if (expr.startsWith(name)) {
      return pointResult(formatDate(today.add({ days: offset })), expr, 1.0);
    }
  }

  for (const [pattern, direction] of DAY_OFFSETS) {
    const m = pattern.exec(expr);
    if (!m) continue;
    const days = chineseToNumber(m[1]) * direction;
    const target = withinCalendar(() => today.add({ days }));
    if (target === null) return null;
    return pointResult(formatDate(target), expr, 0.95);
  }

  return null;
}
