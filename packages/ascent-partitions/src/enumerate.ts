/**
 * Convenience entry points over `Partitions`.
 *
 * @example
 * ```typescript
 * [...enumeratePartitions(3)]; // [[1, 1, 1], [1, 2], [3]]
 *
 * forEachPartition(30, (view) => {
 *   histogram[view.length]++;
 * });
 *
 * countPartitions(10); // 42
 * ```
 */

import type { GeneratorOptions } from "./config.js";
import { Partitions } from "./Partitions.js";
import type { PartitionView } from "./types.js";

/**
 * Visitor for `forEachPartition`. Return `false` to stop early.
 */
export type PartitionVisitor = (view: PartitionView, index: number) => boolean | void;

/**
 * Yield every partition of `n` as a fresh array.
 */
export function* enumeratePartitions(
  n: number,
  options?: GeneratorOptions
): Generator<number[], void, undefined> {
  yield* Partitions.create(n, options);
}

/**
 * Pass every partition of `n` to `visitor` as a view into the working buffer.
 *
 * @returns the number of partitions visited
 */
export function forEachPartition(
  n: number,
  visitor: PartitionVisitor,
  options?: GeneratorOptions
): number {
  const generator = Partitions.create(n, options);
  let visited = 0;
  for (let view = generator.next(); view !== undefined; view = generator.next()) {
    visited++;
    if (visitor(view, visited - 1) === false) break;
  }
  return visited;
}

/**
 * Count the partitions of `n` by enumerating them.
 */
export function countPartitions(n: number, options?: GeneratorOptions): number {
  const generator = Partitions.create(n, options);
  while (generator.next() !== undefined) {
    // drain
  }
  return generator.produced;
}
