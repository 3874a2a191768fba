/**
 * ## Scoped Loggers
 *
 * Console output with a `[scope]` prefix and the data object appended as JSON:
 *
 * ```text
 * [Partitions] Generator created {"n":12,"capacity":13,"recycled":false}
 * [Partitions] Generator exhausted {"n":12,"produced":77}
 * ```
 */

import type { UnknownRecord } from "../types.js";
import { LOG_LEVELS, type Logger, type LogLevel } from "./types.js";

const CONSOLE_METHODS = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
} as const satisfies Record<LogLevel, keyof Console>;

/**
 * One log line. Empty or missing data adds nothing after the message.
 */
export function formatLogLine(scope: string, message: string, data?: UnknownRecord): string {
  if (data === undefined || Object.keys(data).length === 0) {
    return `[${scope}] ${message}`;
  }
  return `[${scope}] ${message} ${JSON.stringify(data)}`;
}

/**
 * Logger writing to `globalThis.console`, keeping entries at `level` or above.
 *
 * The console is looked up on every entry, so spies installed after the
 * logger was created still receive output.
 */
export function createScopedLogger(scope: string, level: LogLevel): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const writer =
    (entryLevel: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      if (LOG_LEVELS.indexOf(entryLevel) < threshold) return;
      globalThis.console[CONSOLE_METHODS[entryLevel]](formatLogLine(scope, message, data));
    };

  return {
    debug: writer("DEBUG"),
    info: writer("INFO"),
    warn: writer("WARN"),
    error: writer("ERROR"),
  };
}

/**
 * Logger that drops everything; what a generator uses when nothing is configured.
 */
export function createNoOpLogger(): Logger {
  const discard = (): void => {};
  return { debug: discard, info: discard, warn: discard, error: discard };
}
