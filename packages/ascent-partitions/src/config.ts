/**
 * ## Generator Configuration
 *
 * Validates the input `n` and the generator options with zod before any
 * buffer is allocated.
 *
 * | Option | Default | Effect |
 * |--------|---------|--------|
 * | `logger` | no-op, or a scoped logger when `logLevel` is set | Lifecycle logs |
 * | `logLevel` | `ASCENT_LOG_LEVEL`, else unset | Level of the scoped logger |
 * | `verify` | `false` | Checked mode: assert status transitions and partition invariants after every step |
 */

import { z } from "zod";
import {
  LOG_LEVELS,
  createNoOpLogger,
  createScopedLogger,
  type Logger,
  type LogLevel,
} from "@ascent/core";
import { PartitionErrorCodes, PartitionInvariantError } from "./types.js";

/**
 * Largest supported `n`.
 *
 * The buffer holds `n + 1` entries, and `2^32 - 1` is the longest typed
 * array length the runtime guarantees. Generators near this bound are
 * limited by available memory.
 */
export const MAX_PARTITION_INPUT = 2 ** 32 - 2;

/**
 * Environment variable consulted when no `logLevel` option is given.
 */
export const LOG_LEVEL_ENV_VAR = "ASCENT_LOG_LEVEL";

export const LOGGER_SCOPE = "Partitions";

export const PartitionInputSchema = z
  .number({ message: "n must be a number" })
  .int("n must be an integer")
  .nonnegative("n must be non-negative")
  .max(MAX_PARTITION_INPUT, `n must not exceed ${MAX_PARTITION_INPUT}`);

export const LogLevelSchema = z.enum(LOG_LEVELS);

const LoggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    LOG_LEVELS.every((level) => typeof Reflect.get(value, level.toLowerCase()) === "function"),
  { message: "logger must implement debug, info, warn and error" }
);

export const GeneratorOptionsSchema = z
  .object({
    logger: LoggerSchema.optional(),
    logLevel: LogLevelSchema.optional(),
    verify: z.boolean().optional(),
  })
  .strict();

/**
 * Options accepted by every generator entry point.
 */
export interface GeneratorOptions {
  /** Receives lifecycle logs. Takes precedence over `logLevel`. */
  logger?: Logger;
  /** Create a scoped `[Partitions]` logger at this level. */
  logLevel?: LogLevel;
  /** Checked mode. */
  verify?: boolean;
}

/**
 * Options after defaults are applied.
 */
export interface ResolvedGeneratorOptions {
  logger: Logger;
  verify: boolean;
}

function formatIssues(error: z.ZodError): Array<{ path: string; message: string; code: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate `n`.
 *
 * @throws PartitionInvariantError with code INVALID_PARTITION_INPUT
 */
export function parsePartitionInput(n: unknown): number {
  const result = PartitionInputSchema.safeParse(n);
  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new PartitionInvariantError(
      PartitionErrorCodes.INVALID_PARTITION_INPUT,
      `Invalid partition input: ${errors.map((e) => e.message).join(", ")}`,
      { n, errors }
    );
  }
  return result.data;
}

/**
 * Read the log level from the environment.
 *
 * @returns undefined when the variable is unset or empty
 * @throws PartitionInvariantError with code INVALID_GENERATOR_OPTIONS for unknown levels
 */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const raw = env[LOG_LEVEL_ENV_VAR];
  if (raw === undefined || raw === "") return undefined;

  const result = LogLevelSchema.safeParse(raw.toUpperCase());
  if (!result.success) {
    throw new PartitionInvariantError(
      PartitionErrorCodes.INVALID_GENERATOR_OPTIONS,
      `${LOG_LEVEL_ENV_VAR} must be one of ${LOG_LEVELS.join(", ")}`,
      { value: raw }
    );
  }
  return result.data;
}

/**
 * Validate options and apply defaults.
 *
 * @throws PartitionInvariantError with code INVALID_GENERATOR_OPTIONS
 */
export function resolveGeneratorOptions(
  options: GeneratorOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedGeneratorOptions {
  const result = GeneratorOptionsSchema.safeParse(options);
  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new PartitionInvariantError(
      PartitionErrorCodes.INVALID_GENERATOR_OPTIONS,
      `Invalid generator options: ${errors.map((e) => e.message).join(", ")}`,
      { errors }
    );
  }

  const { logger, logLevel, verify } = result.data;
  const level = logLevel ?? logLevelFromEnv(env);

  return {
    logger: logger ?? (level !== undefined ? createScopedLogger(LOGGER_SCOPE, level) : createNoOpLogger()),
    verify: verify ?? false,
  };
}
