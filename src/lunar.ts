// Lunar (Chinese) calendar → solar date conversion.

import { Temporal } from "@js-temporal/polyfill";

export type LunarConversion =
  | { ok: true; date: Temporal.PlainDate }
  | { ok: false; reason: string };

/**
 * Converts a lunar month/day in lunar year `year` to an ISO date. Must not
 * throw: failures come back as `{ ok: false }` and the caller skips the
 * lunar holiday.
 */
export interface LunarCalendar {
  toSolar(year: number, lunarMonth: number, lunarDay: number): LunarConversion;
}

// Range covered by the ICU chinese calendar data we rely on.
const MIN_YEAR = 1901;
const MAX_YEAR = 2099;

/**
 * Lunar conversion backed by the Temporal `chinese` calendar, which reads the
 * ICU data bundled with Node.js. Lunar year `N` is the one whose first day
 * falls in ISO year `N`.
 */
export class IntlLunarCalendar implements LunarCalendar {
  toSolar(year: number, lunarMonth: number, lunarDay: number): LunarConversion {
    if (year < MIN_YEAR || year > MAX_YEAR) {
      return { ok: false, reason: `year ${year} outside ${MIN_YEAR}-${MAX_YEAR}` };
    }
    try {
      // New year's eve is day 29 or 30 depending on the year: step back from
      // new year's day instead.
      if (lunarMonth === 12 && lunarDay >= 29) {
        return { ok: true, date: fromChinese(year, 1, 1).subtract({ days: 1 }) };
      }
      return { ok: true, date: fromChinese(year, lunarMonth, lunarDay) };
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      return {
        ok: false,
        reason: `cannot convert lunar date ${year}/${lunarMonth}/${lunarDay}: ${detail}`,
      };
    }
  }
}

function fromChinese(year: number, month: number, day: number): Temporal.PlainDate {
  return Temporal.PlainDate.from(
    {
      calendar: "chinese",
      year,
      monthCode: `M${String(month).padStart(2, "0")}`,
      day,
    },
    { overflow: "reject" },
  ).withCalendar("iso8601");
}

/** For hosts without lunar support: every conversion is unavailable. */
export class UnavailableLunarCalendar implements LunarCalendar {
  toSolar(): LunarConversion {
    return { ok: false, reason: "lunar calendar support is not available" };
  }
}

/**
 * Fixed lookup table, keyed `year-month-day`. Useful when the conversions a
 * deployment needs are known ahead of time.
 */
export class TableLunarCalendar implements LunarCalendar {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(entries: Record<string, string>) {
    this.entries = new Map(Object.entries(entries));
  }

  toSolar(year: number, lunarMonth: number, lunarDay: number): LunarConversion {
    const key = `${year}-${lunarMonth}-${lunarDay}`;
    const iso = this.entries.get(key);
    if (iso === undefined) {
      return { ok: false, reason: `no entry for lunar date ${key}` };
    }
    try {
      return { ok: true, date: Temporal.PlainDate.from(iso) };
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      return { ok: false, reason: `bad table entry for ${key}: ${detail}` };
    }
  }
}
