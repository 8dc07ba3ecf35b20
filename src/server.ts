// MCP server exposing the parser as a single `parse_time` tool.

import { readFileSync } from "node:fs";
import type { Temporal } from "@js-temporal/polyfill";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DEFAULT_TIMEZONE, FuzzyTimeParser } from "./index.js";
import { type Logger, silentLogger } from "./logger.js";
import type { LunarCalendar } from "./lunar.js";
import { type ParseTimeOutput, toWire } from "./types.js";

export const SERVER_NAME = "zh-fuzzy-time";

const packageManifest = z.object({ version: z.string().min(1) });

/** Version reported to MCP clients, read from package.json. */
export const SERVER_VERSION = packageManifest.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")),
).version;

export interface ParseTimeOptions {
  logger?: Logger;
  lunarCalendar?: LunarCalendar;
  /** Fixed instant to parse against instead of the system clock. */
  now?: Temporal.ZonedDateTime;
}

/**
 * Run one `parse_time` request. Never throws: a bad timezone is reported as
 * `success: false` with the message in `error`.
 */
export function handleParseTime(
  expression: string,
  timezone: string = DEFAULT_TIMEZONE,
  options: ParseTimeOptions = {},
): ParseTimeOutput {
  const logger = options.logger ?? silentLogger;
  try {
    const parser = new FuzzyTimeParser({
      timezone,
      logger,
      lunarCalendar: options.lunarCalendar,
    });
    const parsed = options.now ? parser.parseAt(expression, options.now) : parser.parse(expression);
    logger.info(`parsed '${parsed.originalExpression}' with confidence ${parsed.confidence}`);
    return { success: true, parsed: toWire(parsed), error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`parse_time failed: ${message}`);
    return { success: false, parsed: null, error: message };
  }
}

export interface ServerOptions {
  defaultTimezone?: string;
  logger?: Logger;
  lunarCalendar?: LunarCalendar;
}

const TOOL_DESCRIPTION = [
  "解析模糊时间表达式为标准日期时间格式。",
  "Parse Chinese fuzzy time expressions into YYYY-MM-DD dates, YYYY-MM-DD HH:mm:ss datetimes or [start, end] ranges.",
  "Supported: relative days (昨天, 三天前), weeks (上周, 两周后), months (上个月),",
  "weekdays (下周一), clock times (下午3点30分), dates (2024年1月1日, 15号),",
  "holidays (国庆节期间, 春节, 中秋节) and ranges (昨天到今天, 上周一到周五).",
  "Unrecognised text falls back to today with confidence 0.3.",
].join("\n");

export function createServer(options: ServerOptions = {}): McpServer {
  const defaultTimezone = options.defaultTimezone ?? DEFAULT_TIMEZONE;
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    "parse_time",
    {
      title: "Parse Chinese Time Expression",
      description: TOOL_DESCRIPTION,
      inputSchema: {
        expression: z
          .string()
          .describe('Fuzzy time expression in Chinese, e.g. "昨天", "三周前", "国庆节期间", "上午9点"'),
        timezone: z
          .string()
          .optional()
          .describe(`IANA timezone name, e.g. "UTC" or "America/New_York" (default ${defaultTimezone})`),
      },
    },
    async ({ expression, timezone }) => {
      const output = handleParseTime(expression, timezone ?? defaultTimezone, {
        logger: options.logger,
        lunarCalendar: options.lunarCalendar,
      });
      return {
        content: [{ type: "text", text: JSON.stringify(output) }],
        structuredContent: output,
        isError: !output.success,
      };
    },
  );

  return server;
}
