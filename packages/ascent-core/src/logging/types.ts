import type { UnknownRecord } from "../types.js";

/**
 * Levels in increasing severity. A logger configured at one level drops
 * everything listed before it.
 */
export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Sink for lifecycle events.
 *
 * Generators report creation, exhaustion and release at DEBUG with a small
 * data object, e.g. `debug("Generator released", { n, produced, capacity })`.
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}
