// zh-fuzzy-time — Public API

import { Temporal } from "@js-temporal/polyfill";
import { resolve } from "./cascade.js";
import { FuzzyTimeError } from "./error.js";
import { type Logger, silentLogger } from "./logger.js";
import { IntlLunarCalendar, type LunarCalendar } from "./lunar.js";
import type { ParseContext, ParsedTime } from "./types.js";

export const DEFAULT_TIMEZONE = "Asia/Shanghai";

export interface ParserOptions {
  /** IANA zone that "today" and "now" are read in. Defaults to Asia/Shanghai. */
  timezone?: string;
  lunarCalendar?: LunarCalendar;
  logger?: Logger;
}

/** Check if a string names a timezone Temporal can resolve. */
export function isValidTimeZone(timezone: string): boolean {
  try {
    Temporal.Now.zonedDateTimeISO(timezone);
    return true;
  } catch {
    return false;
  }
}

export class FuzzyTimeParser {
  readonly timezone: string;
  private readonly lunar: LunarCalendar;
  private readonly logger: Logger;

  /** Throws `FuzzyTimeError` (kind `timezone`) for an unknown zone. */
  constructor(options: ParserOptions = {}) {
    const timezone = options.timezone ?? DEFAULT_TIMEZONE;
    try {
      Temporal.Now.zonedDateTimeISO(timezone);
    } catch (err) {
      throw FuzzyTimeError.timezone(timezone, err);
    }
    this.timezone = timezone;
    this.lunar = options.lunarCalendar ?? new IntlLunarCalendar();
    this.logger = options.logger ?? silentLogger;
  }

  /** Parse against the current time in this parser's timezone. */
  parse(expression: string): ParsedTime {
    return this.parseAt(expression, Temporal.Now.zonedDateTimeISO(this.timezone));
  }

  /**
   * Parse against a fixed instant, viewed in this parser's timezone. Every
   * part of the expression, both ends of a range included, sees this instant.
   */
  parseAt(expression: string, now: Temporal.ZonedDateTime): ParsedTime {
    const ctx: ParseContext = {
      now: now.withTimeZone(this.timezone),
      lunar: this.lunar,
      logger: this.logger,
    };
    return resolve(expression.trim(), ctx);
  }
}

/** Parse once with a throwaway parser. */
export function parseTime(expression: string, timezone: string = DEFAULT_TIMEZONE): ParsedTime {
  return new FuzzyTimeParser({ timezone }).parse(expression);
}

export { Temporal } from "@js-temporal/polyfill";
export { CASCADE, FALLBACK_CONFIDENCE } from "./cascade.js";
export { FuzzyTimeError } from "./error.js";
export type { FuzzyTimeErrorKind } from "./error.js";
export { createLogger, silentLogger } from "./logger.js";
export type { LogLevel, Logger } from "./logger.js";
export {
  IntlLunarCalendar,
  TableLunarCalendar,
  UnavailableLunarCalendar,
} from "./lunar.js";
export type { LunarCalendar, LunarConversion } from "./lunar.js";
export { RANGE_HALF_MATCHERS } from "./matchers/range.js";
export { chineseToNumber } from "./numeral.js";
export { toWire } from "./types.js";
export type {
  Matcher,
  NamedMatcher,
  ParseContext,
  ParseTimeOutput,
  ParsedTime,
  TimeValue,
  WireParsedTime,
} from "./types.js";
