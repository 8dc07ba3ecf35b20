// Levelled logger. Everything goes to stderr: stdout carries the MCP stdio
// protocol and must not receive log lines.

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly scope: string;

  constructor(level: LogLevel, scope: string) {
    this.threshold = LEVEL_RANK[level];
    this.scope = scope;
  }

  debug(message: string, ...details: unknown[]): void {
    this.write("debug", message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write("info", message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write("warn", message, details);
  }

  error(message: string, ...details: unknown[]): void {
    this.write("error", message, details);
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, details: unknown[]): void {
    if (LEVEL_RANK[level] < this.threshold) return;
    const stamp = new Date().toISOString();
    console.error(`${stamp} ${level.toUpperCase()} [${this.scope}] ${message}`, ...details);
  }
}

export function createLogger(level: LogLevel = "info", scope = "zh-fuzzy-time"): Logger {
  return new ConsoleLogger(level, scope);
}

export const silentLogger: Logger = createLogger("silent");
