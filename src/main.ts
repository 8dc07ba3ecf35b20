#!/usr/bin/env node
// Entry point: serve `parse_time` over stdio.

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { FuzzyTimeError } from "./error.js";
import { createLogger } from "./logger.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const server = createServer({ defaultTimezone: config.defaultTimezone, logger });

  const shutdown = (signal: string): void => {
    logger.info(`received ${signal}, shutting down`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("error during shutdown", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await server.connect(new StdioServerTransport());
  logger.info(`listening on stdio (default timezone ${config.defaultTimezone})`);
}

main().catch((err: unknown) => {
  if (err instanceof FuzzyTimeError) {
    console.error(err.displayRich());
  } else {
    console.error("zh-fuzzy-time failed to start:", err);
  }
  process.exit(1);
});
