/**
 * Structured console logger, prefixed with the plugin scope.
 * Messages below the configured level are dropped.
 */

import type { Logger, LogLevel } from "../plugins/api.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const prefix = `[${scope}]`;
  const threshold = LEVEL_RANK[level];

  const emit = (
    at: Exclude<LogLevel, "silent">,
    sink: (...args: unknown[]) => void,
    message: string,
    data?: Record<string, unknown>,
  ): void => {
    if (LEVEL_RANK[at] < threshold) return;
    if (data) sink(prefix, message, data);
    else sink(prefix, message);
  };

  return {
    debug: (message, data) => emit("debug", console.debug, message, data),
    info: (message, data) => emit("info", console.info, message, data),
    warn: (message, data) => emit("warn", console.warn, message, data),
    error: (message, data) => emit("error", console.error, message, data),
  };
}

/** Parse a level name, falling back to `fallback` for anything unknown */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "silent":
      return value;
    default:
      return fallback;
  }
}
