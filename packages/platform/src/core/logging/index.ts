/**
 * Logging
 *
 * Structured JSON-line logging for the navigation engine and its hosts.
 * One line per entry: { time, level, context, message, ...data }.
 * Warnings and errors are also forwarded to the observability provider.
 *
 * The threshold comes from NAVDOCK_LOG_LEVEL (debug | info | warn | error),
 * defaulting to "info" in production and "debug" everywhere else.
 */

import type { Logger } from "@navdock/contracts";
import { captureMessage } from "../observability/index.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Threshold for the given environment.
 * An unknown NAVDOCK_LOG_LEVEL falls back to the default.
 */
export function logLevelFrom(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.NAVDOCK_LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) return configured;
  return env.NODE_ENV === "production" ? "info" : "debug";
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Creates a logger that tags every entry with a context identifier
 * (e.g., "demo", "panels"). The environment is read per entry, so
 * a changed NAVDOCK_LOG_LEVEL takes effect without new loggers.
 */
export function createLogger(
  context: string,
  env: NodeJS.ProcessEnv = process.env
): Logger {
  const write = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    const threshold = logLevelFrom(env);
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(threshold)) return;

    // Data cannot overwrite the entry's own fields
    WRITERS[level](
      JSON.stringify({
        ...data,
        time: new Date().toISOString(),
        level,
        context,
        message,
      })
    );
  };

  return {
    debug(message, data) {
      write("debug", message, data);
    },
    info(message, data) {
      write("info", message, data);
    },
    warn(message, data) {
      write("warn", message, data);
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      write("error", message, data);
      captureMessage(`[${context}] ${message}`, "error", data);
    },
  };
}
