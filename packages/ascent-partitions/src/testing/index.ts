/**
 * Testing utilities for partition generators.
 *
 * @module @ascent/partitions/testing
 */

export {
  partitionKey,
  collectPartitions,
  assertValidPartition,
  assertPartitionSequence,
  assertExhaustedIdempotently,
} from "./assertions.js";

export {
  MAX_EXACT_RECURRENCE_INPUT,
  partitionCountsUpTo,
  partitionCountByRecurrence,
} from "./recurrence.js";
