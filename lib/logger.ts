// ---------------------------------------------------------------------------
// clanker-guard logging
// JSON-lines logger with levels and child contexts. Never pass secrets.
// ---------------------------------------------------------------------------

import type { LogLevel } from "./types";

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  fields?: Record<string, unknown>;
  /** Output sink, one serialized line per call. Defaults to the console. */
  write?: (level: LogLevel, line: string) => void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function consoleWrite(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_PRIORITY[options.level ?? "info"];
  const write = options.write ?? consoleWrite;
  const base = { service: options.name ?? "clanker-guard", ...options.fields };

  const instance = (fields: Record<string, unknown>): Logger => {
    const emit = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
      if (LEVEL_PRIORITY[level] < threshold) return;
      write(
        level,
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level,
          message,
          ...fields,
          ...context,
        })
      );
    };

    return {
      debug: (message, context) => emit("debug", message, context),
      info: (message, context) => emit("info", message, context),
      warn: (message, context) => emit("warn", message, context),
      error: (message, context) => emit("error", message, context),
      child: (extra) => instance({ ...fields, ...extra }),
    };
  };

  return instance(base);
}

/** Logger that drops everything; for tests. */
export const silentLogger: Logger = createLogger({ write: () => undefined });
