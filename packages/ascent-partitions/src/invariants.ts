/**
 * Invariants every emitted partition satisfies.
 *
 * Checked after each step in checked mode (`verify: true`) and reused by the
 * testing helpers.
 */

import { createInvariant, createInvariantSet } from "@ascent/core";
import { PartitionErrorCodes, PartitionInvariantError, type PartitionErrorCode } from "./types.js";

type Parts = ArrayLike<number>;

function sumOf(parts: Parts): number {
  let total = 0;
  for (let i = 0; i < parts.length; i++) {
    total += parts[i];
  }
  return total;
}

function firstIndexWhere(parts: Parts, predicate: (part: number, i: number) => boolean): number {
  for (let i = 0; i < parts.length; i++) {
    if (predicate(parts[i], i)) return i;
  }
  return -1;
}

export const partsSumToN = createInvariant<Parts, PartitionErrorCode, [number]>(
  {
    name: "partsSumToN",
    code: PartitionErrorCodes.PARTITION_SUM_MISMATCH,
    check: (parts, n) => sumOf(parts) === n,
    message: (parts, n) => `Parts sum to ${sumOf(parts)}, expected ${n}`,
    context: (parts, n) => ({ parts: Array.from(parts), n }),
  },
  PartitionInvariantError
);

export const partsArePositive = createInvariant<Parts, PartitionErrorCode, [number]>(
  {
    name: "partsArePositive",
    code: PartitionErrorCodes.PARTITION_NON_POSITIVE_PART,
    check: (parts) => firstIndexWhere(parts, (part) => !(part > 0)) === -1,
    message: (parts) => {
      const index = firstIndexWhere(parts, (part) => !(part > 0));
      return `Part at index ${index} is ${String(parts[index])}, expected a positive integer`;
    },
    context: (parts, n) => ({ parts: Array.from(parts), n }),
  },
  PartitionInvariantError
);

export const partsAreNonDecreasing = createInvariant<Parts, PartitionErrorCode, [number]>(
  {
    name: "partsAreNonDecreasing",
    code: PartitionErrorCodes.PARTITION_NOT_NON_DECREASING,
    check: (parts) => firstIndexWhere(parts, (part, i) => i > 0 && part < parts[i - 1]) === -1,
    message: (parts) => {
      const index = firstIndexWhere(parts, (part, i) => i > 0 && part < parts[i - 1]);
      return `Part at index ${index} is smaller than the part before it`;
    },
    context: (parts, n) => ({ parts: Array.from(parts), n }),
  },
  PartitionInvariantError
);

/**
 * Sum, positivity and ordering, checked in that order.
 *
 * @example
 * ```typescript
 * partitionInvariants.assertAll([1, 1, 2], 4); // ok
 * partitionInvariants.validateAll([3, 0], 4);
 * // { valid: false, violations: [SUM_MISMATCH, NON_POSITIVE_PART, NOT_NON_DECREASING] }
 * ```
 */
export const partitionInvariants = createInvariantSet([
  partsSumToN,
  partsArePositive,
  partsAreNonDecreasing,
]);
