import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  /**
   * Restores the console and resolves once the log file is flushed; rejects
   * with the stream error if the file could not be written.
   */
  shutdown(): Promise<void>;
}

type ConsoleMethod = "log" | "debug" | "info" | "warn" | "error";

function stringify(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}

/** Mirrors console output into `logFile` until `shutdown()` is called. */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => Promise.resolve(),
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const original: Record<ConsoleMethod, (...args: unknown[]) => void> = {
    log: console.log.bind(console),
    debug: console.debug.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  let failure: Error | null = null;
  stream.on("error", (err) => {
    if (failure) return;
    failure = err;
    original.error(`Log file ${resolvedLog} is not writable: ${err.message}`);
  });
  stream.write(`[${new Date().toISOString()}] --- lapwatch session started ---\n`);

  const mirror = (level: ConsoleMethod) =>
    (...args: unknown[]) => {
      original[level](...args);
      if (failure) return;
      const message = args.map(stringify).join(" ");
      stream.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}\n`);
    };

  console.log = mirror("log");
  console.debug = mirror("debug");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");

  let closed: Promise<void> | null = null;
  const shutdown = () => {
    if (closed) return closed;
    console.log = original.log;
    console.debug = original.debug;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    closed = new Promise<void>((resolve, reject) => {
      if (failure) {
        reject(failure);
        return;
      }
      stream.once("error", reject);
      stream.once("finish", () => resolve());
      stream.end(`[${new Date().toISOString()}] --- lapwatch session ended ---\n`);
    });
    return closed;
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
