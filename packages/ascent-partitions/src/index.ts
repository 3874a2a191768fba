/**
 * Integer partition enumeration in constant amortized time per partition.
 *
 * @example
 * ```typescript
 * import { Partitions, enumeratePartitions } from "@ascent/partitions";
 *
 * for (const parts of enumeratePartitions(4)) {
 *   console.log(parts.join(" + "));
 * }
 * // 1 + 1 + 1 + 1
 * // 1 + 1 + 2
 * // 1 + 3
 * // 2 + 2
 * // 4
 * ```
 *
 * @module @ascent/partitions
 */

// Types
export type {
  PartitionBuffer,
  PartitionView,
  GeneratorPhase,
  GeneratorStatus,
  PartitionErrorCode,
} from "./types.js";
export { PartitionErrorCodes, PartitionInvariantError } from "./types.js";

// Generator
export { Partitions } from "./Partitions.js";
export {
  enumeratePartitions,
  forEachPartition,
  countPartitions,
  type PartitionVisitor,
} from "./enumerate.js";

// Configuration
export type { GeneratorOptions, ResolvedGeneratorOptions } from "./config.js";
export {
  MAX_PARTITION_INPUT,
  LOG_LEVEL_ENV_VAR,
  LOGGER_SCOPE,
  PartitionInputSchema,
  GeneratorOptionsSchema,
  parsePartitionInput,
  resolveGeneratorOptions,
  logLevelFromEnv,
} from "./config.js";

// Lifecycle and invariants
export { partitionPhaseMachine } from "./phases.js";
export {
  partitionInvariants,
  partsSumToN,
  partsArePositive,
  partsAreNonDecreasing,
} from "./invariants.js";

// Buffers
export { allocateBuffer, reclaimBuffer, type PreparedBuffer } from "./buffer.js";
