/**
 * Working buffer allocation and reuse.
 *
 * A generator for `n` needs `n + 1` zeroed slots. `reclaimBuffer` keeps a
 * caller's buffer when it is large enough, so a sequence of enumerations can
 * share one allocation.
 */

import type { PartitionBuffer } from "./types.js";

/**
 * Backing storage plus the zeroed window of `n + 1` slots the algorithm uses.
 */
export interface PreparedBuffer {
  /** Everything the generator owns; returned by `end()`. */
  storage: PartitionBuffer;
  /** `storage.subarray(0, n + 1)`, zero-filled. */
  work: PartitionBuffer;
  /** True when `storage` is the caller's buffer. */
  reused: boolean;
}

export function allocateBuffer(n: number): PreparedBuffer {
  const storage = new Uint32Array(n + 1);
  return { storage, work: storage, reused: false };
}

/**
 * Zero the first `n + 1` slots of `buffer`, or allocate a new buffer when
 * `buffer` is shorter than that.
 */
export function reclaimBuffer(n: number, buffer: PartitionBuffer): PreparedBuffer {
  if (buffer.length < n + 1) {
    return allocateBuffer(n);
  }
  const work = buffer.subarray(0, n + 1);
  work.fill(0);
  return { storage: buffer, work, reused: true };
}
