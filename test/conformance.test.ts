// Conformance test runner — drives all cases from conformance/tests.json.

import { readFileSync } from "node:fs";
import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { FuzzyTimeParser, UnavailableLunarCalendar } from "../src/index.js";

const caseSchema = z.object({
  name: z.string().optional(),
  input: z.string(),
  now: z.string().optional(),
  value: z.union([z.string(), z.tuple([z.string(), z.string()])]),
  confidence: z.number(),
  is_date_only: z.boolean().default(true),
});

const fileSchema = z.object({
  now: z.string(),
  timezone: z.string(),
  parse: z.record(z.object({ tests: z.array(caseSchema) })),
});

const suite = fileSchema.parse(
  JSON.parse(readFileSync(new URL("../conformance/tests.json", import.meta.url), "utf-8")),
);
const defaultNow = Temporal.ZonedDateTime.from(suite.now);

// Lunar holidays are covered in holiday.test.ts; the cases here must not
// depend on ICU calendar data.
const parser = new FuzzyTimeParser({
  timezone: suite.timezone,
  lunarCalendar: new UnavailableLunarCalendar(),
});

// ===========================================================================
// Parse conformance
// ===========================================================================

for (const [section, { tests }] of Object.entries(suite.parse)) {
  describe(section, () => {
    for (const tc of tests) {
      it(tc.name ?? (tc.input || "(empty)"), () => {
        const now = tc.now ? Temporal.ZonedDateTime.from(tc.now) : defaultNow;
        const result = parser.parseAt(tc.input, now);

        expect(result.value).toEqual(tc.value);
        expect(result.isRange).toBe(Array.isArray(tc.value));
        expect(result.isDateOnly).toBe(tc.is_date_only);
        expect(result.confidence).toBe(tc.confidence);
        expect(result.originalExpression).toBe(tc.input);
      });
    }
  });
}

// ===========================================================================
// Idempotency
// ===========================================================================

describe("idempotency", () => {
  for (const { tests } of Object.values(suite.parse)) {
    for (const tc of tests.slice(0, 2)) {
      it(`parsing '${tc.input}' twice gives the same result`, () => {
        const now = tc.now ? Temporal.ZonedDateTime.from(tc.now) : defaultNow;
        expect(parser.parseAt(tc.input, now)).toEqual(parser.parseAt(tc.input, now));
      });
    }
  }
});
