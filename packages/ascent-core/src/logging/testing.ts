/**
 * In-memory logger for asserting on lifecycle events.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * new Partitions(3, { logger }).end();
 *
 * logger.messages(); // ["Generator created", "Generator released"]
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel } from "./types.js";

export interface LogEntry {
  level: LogLevel;
  message: string;
  data: UnknownRecord | undefined;
}

export interface MockLogger extends Logger {
  /** Every entry in the order it was logged. */
  readonly entries: readonly LogEntry[];
  entriesAt(level: LogLevel): LogEntry[];
  messages(): string[];
  clear(): void;
}

export function createMockLogger(): MockLogger {
  const entries: LogEntry[] = [];

  const recorder =
    (level: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      entries.push({ level, message, data });
    };

  return {
    entries,
    entriesAt: (level) => entries.filter((entry) => entry.level === level),
    messages: () => entries.map((entry) => entry.message),
    clear: () => {
      entries.length = 0;
    },
    debug: recorder("DEBUG"),
    info: recorder("INFO"),
    warn: recorder("WARN"),
    error: recorder("ERROR"),
  };
}
