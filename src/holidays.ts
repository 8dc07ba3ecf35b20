// Holiday tables, read from data/holidays.json once per process.

import { readFileSync } from "node:fs";
import { z } from "zod";

const fixedHoliday = z.object({
  name: z.string().min(1),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
  days: z.number().int().min(1),
});

const holidayTableSchema = z.object({
  periodMarker: z.string().min(1),
  solar: z.array(fixedHoliday),
  lunar: z.array(fixedHoliday),
  qingming: z.object({
    names: z.array(z.string().min(1)).min(1),
    days: z.number().int().min(1),
    periodDays: z.number().int().min(1),
  }),
});

export type FixedHoliday = z.infer<typeof fixedHoliday>;
export type HolidayTable = z.infer<typeof holidayTableSchema>;

const TABLE_URL = new URL("../data/holidays.json", import.meta.url);

let cached: HolidayTable | null = null;

/** The holiday table; order within each list is match precedence. */
export function holidayTable(): HolidayTable {
  if (cached === null) {
    cached = holidayTableSchema.parse(JSON.parse(readFileSync(TABLE_URL, "utf-8")));
  }
  return cached;
}
