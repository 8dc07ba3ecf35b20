import { Temporal } from "@js-temporal/polyfill";
import { formatDateTime } from "../format.js";
import { NUMERAL, chineseToNumber } from "../numeral.js";
import { type ParseContext, type ParsedTime, pointResult } from "../types.js";

const PERIODS = ["凌晨", "早上", "上午", "中午", "下午", "晚上", "深夜"] as const;

type Period = (typeof PERIODS)[number];

const TIME_PATTERN = new RegExp(`(${PERIODS.join("|")})?${NUMERAL}点(?:${NUMERAL}分?)?`);

function adjustHour(period: Period | undefined, hour: number): number {
  if ((period === "下午" || period === "晚上") && hour < 12) return hour + 12;
  if (period === "凌晨" && hour === 12) return 0;
  return hour;
}

function isPeriod(value: string | undefined): value is Period {
  return PERIODS.some((p) => p === value);
}

/**
 * 下午3点30分, 早上八点, 9点 → today at that clock time. The pattern may sit
 * anywhere in the text.
 */
export function matchTimeOfDay(expr: string, ctx: ParseContext): ParsedTime | null {
  const m = TIME_PATTERN.exec(expr);
  if (!m) return null;

  const period = isPeriod(m[1]) ? m[1] : undefined;
  const hour = adjustHour(period, chineseToNumber(m[2]));
  const minute = m[3] === undefined ? 0 : chineseToNumber(m[3]);

  if (!Number.isInteger(hour) || hour < 0 || hour > 23) return null;
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) return null;

  const at = ctx.now.toPlainDate().toPlainDateTime(Temporal.PlainTime.from({ hour, minute }));
  return pointResult(formatDateTime(at), expr, 0.9, false);
}
