// Result and context types shared by every matcher.

import type { Temporal } from "@js-temporal/polyfill";
import type { Logger } from "./logger.js";
import type { LunarCalendar } from "./lunar.js";

/** A single date / datetime string, or a closed `[start, end]` interval. */
export type TimeValue = string | readonly [string, string];

export interface ParsedTime {
  readonly value: TimeValue;
  readonly isRange: boolean;
  /** False only when a clock time was present in the text. */
  readonly isDateOnly: boolean;
  readonly originalExpression: string;
  /** Heuristic score in [0, 1]; 0.3 means nothing matched. */
  readonly confidence: number;
}

/** Snake-case form returned over the wire. */
export interface WireParsedTime {
  value: string | [string, string];
  is_range: boolean;
  is_date_only: boolean;
  original_expression: string;
  confidence: number;
}

export type ParseTimeOutput =
  | { success: true; parsed: WireParsedTime; error: null }
  | { success: false; parsed: null; error: string };

/**
 * Everything a matcher may consult. Built fresh for every top-level parse so
 * both halves of a range see the same instant.
 */
export interface ParseContext {
  readonly now: Temporal.ZonedDateTime;
  readonly lunar: LunarCalendar;
  readonly logger: Logger;
}

/** Returns `null` when the text is not in the matcher's category. */
export type Matcher = (expr: string, ctx: ParseContext) => ParsedTime | null;

export interface NamedMatcher {
  readonly name: string;
  readonly match: Matcher;
}

export function pointResult(
  value: string,
  expr: string,
  confidence: number,
  isDateOnly = true,
): ParsedTime {
  return Object.freeze({
    value,
    isRange: false,
    isDateOnly,
    originalExpression: expr,
    confidence,
  });
}

export function rangeResult(
  start: string,
  end: string,
  expr: string,
  confidence: number,
  isDateOnly = true,
): ParsedTime {
  return Object.freeze({
    value: Object.freeze([start, end] as const),
    isRange: true,
    isDateOnly,
    originalExpression: expr,
    confidence,
  });
}

/** First element of a range, or the value itself. */
export function leadingValue(parsed: ParsedTime): string {
  return typeof parsed.value === "string" ? parsed.value : parsed.value[0];
}

export function toWire(parsed: ParsedTime): WireParsedTime {
  return {
    value:
      typeof parsed.value === "string"
        ? parsed.value
        : [parsed.value[0], parsed.value[1]],
    is_range: parsed.isRange,
    is_date_only: parsed.isDateOnly,
    original_expression: parsed.originalExpression,
    confidence: parsed.confidence,
  };
}
