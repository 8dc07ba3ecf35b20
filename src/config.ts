// Process configuration from environment variables.

import { z } from "zod";
import { FuzzyTimeError } from "./error.js";
import { DEFAULT_TIMEZONE, isValidTimeZone } from "./index.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export interface Config {
  /** Zone used when a `parse_time` call names none. */
  defaultTimezone: string;
  logLevel: LogLevel;
}

const envSchema = z.object({
  FUZZY_TIME_TIMEZONE: z
    .string()
    .trim()
    .min(1)
    .default(DEFAULT_TIMEZONE)
    .refine(isValidTimeZone, (tz) => ({ message: `unknown IANA timezone '${tz}'` })),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw FuzzyTimeError.config(`invalid configuration: ${detail}`);
  }
  return {
    defaultTimezone: parsed.data.FUZZY_TIME_TIMEZONE,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
