import type { LoggerPort } from "../../ports/sys/LoggerPort";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export interface ConsoleLoggerOptions {
  /** Lowest level printed; defaults to "info". */
  level?: LogLevel;
}

function format(message: string, meta?: Record<string, unknown>): string {
  return meta && Object.keys(meta).length ? `${message} ${JSON.stringify(meta)}` : message;
}

export class ConsoleLogger implements LoggerPort {
  private readonly threshold: number;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_RANK[options.level ?? "info"];
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < this.threshold) return;
    WRITERS[level](format(message, meta));
  }
}
