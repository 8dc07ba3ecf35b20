import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import {
  CASCADE,
  DEFAULT_TIMEZONE,
  FALLBACK_CONFIDENCE,
  FuzzyTimeError,
  FuzzyTimeParser,
  RANGE_HALF_MATCHERS,
  UnavailableLunarCalendar,
  isValidTimeZone,
  parseTime,
  toWire,
} from "../src/index.js";

const now = Temporal.ZonedDateTime.from("2024-01-15T10:00:00+08:00[Asia/Shanghai]");
const parser = new FuzzyTimeParser({ lunarCalendar: new UnavailableLunarCalendar() });

describe("construction", () => {
  it("defaults to Asia/Shanghai", () => {
    expect(DEFAULT_TIMEZONE).toBe("Asia/Shanghai");
    expect(new FuzzyTimeParser().timezone).toBe("Asia/Shanghai");
  });

  it("rejects unknown timezones", () => {
    expect(() => new FuzzyTimeParser({ timezone: "Invalid/Timezone" })).toThrow(FuzzyTimeError);
    try {
      new FuzzyTimeParser({ timezone: "Invalid/Timezone" });
    } catch (err) {
      expect(err).toBeInstanceOf(FuzzyTimeError);
      if (err instanceof FuzzyTimeError) {
        expect(err.kind).toBe("timezone");
        expect(err.input).toBe("Invalid/Timezone");
        expect(err.message.startsWith("invalid timezone 'Invalid/Timezone'")).toBe(true);
      }
    }
  });

  it("validates timezone names", () => {
    expect(isValidTimeZone("UTC")).toBe(true);
    expect(isValidTimeZone("America/New_York")).toBe(true);
    expect(isValidTimeZone("Invalid/Timezone")).toBe(false);
    expect(isValidTimeZone("")).toBe(false);
  });
});

describe("cascade order", () => {
  it("tries ranges first and weekdays before weeks", () => {
    expect(CASCADE.map((m) => m.name)).toEqual([
      "range",
      "holiday",
      "relativeDay",
      "weekday",
      "relativeWeek",
      "relativeMonth",
      "timeOfDay",
      "specificDate",
    ]);
  });

  it("tries weekdays last for range ends", () => {
    expect(RANGE_HALF_MATCHERS.map((m) => m.name)).toEqual([
      "holiday",
      "relativeDay",
      "relativeWeek",
      "relativeMonth",
      "timeOfDay",
      "specificDate",
      "weekday",
    ]);
  });
});

describe("reference instant", () => {
  it("reads today in the parser's timezone", () => {
    // 2024-01-15 04:00 in Shanghai is still the 14th in UTC.
    const early = Temporal.ZonedDateTime.from("2024-01-15T04:00:00+08:00[Asia/Shanghai]");
    const utc = new FuzzyTimeParser({ timezone: "UTC" });
    expect(parser.parseAt("今天", early).value).toBe("2024-01-15");
    expect(utc.parseAt("今天", early).value).toBe("2024-01-14");
  });

  it("uses one instant for both ends of a range", () => {
    const single = parser.parseAt("今天", now);
    const range = parser.parseAt("昨天到今天", now);
    expect(range.value[1]).toBe(single.value);
  });

  it("parse() reads the system clock", () => {
    const before = Temporal.Now.plainDateISO(DEFAULT_TIMEZONE).toString();
    const result = parser.parse("今天");
    const after = Temporal.Now.plainDateISO(DEFAULT_TIMEZONE).toString();
    expect([before, after]).toContain(result.value);
  });

  it("parseTime() parses with a throwaway parser", () => {
    const result = parseTime("明天", "UTC");
    const expected = Temporal.Now.plainDateISO("UTC").add({ days: 1 }).toString();
    expect(result.value).toBe(expected);
    expect(result.confidence).toBe(1.0);
  });
});

describe("results", () => {
  it("trims surrounding whitespace", () => {
    const result = parser.parseAt("  昨天 \n", now);
    expect(result.value).toBe("2024-01-14");
    expect(result.originalExpression).toBe("昨天");
  });

  it("whitespace-only input falls back", () => {
    const result = parser.parseAt("   ", now);
    expect(result.value).toBe("2024-01-15");
    expect(result.confidence).toBe(FALLBACK_CONFIDENCE);
    expect(result.originalExpression).toBe("");
  });

  it("are frozen", () => {
    const result = parser.parseAt("上周", now);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.value)).toBe(true);
  });

  it("range confidence is the weaker end", () => {
    const start = parser.parseAt("三天前", now);
    const end = parser.parseAt("下午3点", now);
    const range = parser.parseAt("三天前到下午3点", now);
    expect(range.confidence).toBe(Math.min(start.confidence, end.confidence));
    expect(range.confidence).toBe(0.9);
    expect(range.isDateOnly).toBe(false);
    expect(range.value).toEqual(["2024-01-12", "2024-01-15 15:00:00"]);
  });

  it("named offsets score at least as high as numeral offsets", () => {
    const pairs: Array<[string, string]> = [
      ["明天", "一天后"],
      ["下周", "一周后"],
      ["下个月", "一个月后"],
    ];
    for (const [named, numeral] of pairs) {
      const a = parser.parseAt(named, now);
      const b = parser.parseAt(numeral, now);
      expect(a.value).toEqual(b.value);
      expect(a.confidence).toBeGreaterThanOrEqual(b.confidence);
      expect(b.confidence).toBeGreaterThan(FALLBACK_CONFIDENCE);
    }
  });
});

describe("toWire", () => {
  it("uses snake_case field names", () => {
    expect(toWire(parser.parseAt("上周", now))).toEqual({
      value: ["2024-01-08", "2024-01-14"],
      is_range: true,
      is_date_only: true,
      original_expression: "上周",
      confidence: 0.95,
    });
  });

  it("copies range values into a plain array", () => {
    const wire = toWire(parser.parseAt("本月", now));
    expect(Array.isArray(wire.value)).toBe(true);
    expect(Object.isFrozen(wire.value)).toBe(false);
  });
});
