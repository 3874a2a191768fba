/**
 * ## Partition Generator Types
 *
 * | Type | Purpose |
 * |------|---------|
 * | `PartitionBuffer` | Working buffer shared by every partition of one enumeration |
 * | `GeneratorPhase` | Resumption point of the two-phase state machine |
 * | `GeneratorStatus` | Lifecycle derived from the phase, plus `exhausted` |
 * | `PartitionInvariantError` | Typed error for invalid input and broken invariants |
 */

import { InvariantError } from "@ascent/core";

/**
 * Working buffer of a generator.
 *
 * Parts are bounded by `n`, and `n` is bounded by `MAX_PARTITION_INPUT`, so
 * every value fits 32 bits. A typed array lets `next()` hand out views of the
 * live prefix without copying.
 */
export type PartitionBuffer = Uint32Array;

/**
 * Where the next call to `next()` resumes.
 *
 * - `outer`: no split in flight; the next step resettles the buffer from `k`.
 * - `inner`: the last step split the residual into `a[k] = x`, `a[l] = y`;
 *   the next step moves one unit from `a[l]` to `a[k]`.
 */
export type GeneratorPhase =
  | { readonly kind: "outer" }
  | { readonly kind: "inner"; readonly x: number; readonly l: number };

/**
 * Lifecycle of a generator, validated by `partitionPhaseMachine` in checked mode.
 */
export type GeneratorStatus = "outer" | "inner" | "exhausted";

/**
 * A partition handed out by `next()`.
 *
 * Shares memory with the working buffer and is overwritten by the next call
 * to `next()`. Copy it (`Array.from(view)`) to keep it.
 */
export type PartitionView = PartitionBuffer;

export const PartitionErrorCodes = {
  INVALID_PARTITION_INPUT: "INVALID_PARTITION_INPUT",
  INVALID_GENERATOR_OPTIONS: "INVALID_GENERATOR_OPTIONS",
  GENERATOR_RELEASED: "GENERATOR_RELEASED",
  PARTITION_SUM_MISMATCH: "PARTITION_SUM_MISMATCH",
  PARTITION_NON_POSITIVE_PART: "PARTITION_NON_POSITIVE_PART",
  PARTITION_NOT_NON_DECREASING: "PARTITION_NOT_NON_DECREASING",
} as const;
export type PartitionErrorCode = (typeof PartitionErrorCodes)[keyof typeof PartitionErrorCodes];

export const PartitionInvariantError = InvariantError.forContext<PartitionErrorCode>("Partition");
