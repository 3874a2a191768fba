/**
 * ## Partitions - Accelerated Ascending-Composition Generator
 *
 * Enumerates the partitions of `n` in constant amortized time per partition
 * (Kelleher's accelerated ascending-composition method). Each partition is
 * written into one shared buffer, starting from the slots the previous
 * partition left behind, and the generator resumes from an explicit phase
 * instead of a call stack.
 *
 * ### Consuming
 *
 * | Method | Returns | Notes |
 * |--------|---------|-------|
 * | `next()` | `Uint32Array \| undefined` | View into the buffer, overwritten by the next call |
 * | `nextOwned()` | `number[] \| undefined` | Fresh copy |
 * | `[Symbol.iterator]()` | `number[]` per step | Copies |
 * | `views()` | `Uint32Array` per step | Views |
 * | `end()` | `Uint32Array` | Hands the buffer back; the generator is unusable afterwards |
 *
 * ### Order
 *
 * Partitions come out as non-decreasing sequences, in the order the state
 * machine visits them. For `n = 4`: `[1,1,1,1]`, `[1,1,2]`, `[1,3]`, `[2,2]`, `[4]`.
 *
 * @example
 * ```typescript
 * const generator = new Partitions(5);
 * for (let view = generator.next(); view !== undefined; view = generator.next()) {
 *   consume(view); // valid until the next call
 * }
 *
 * // Reuse the buffer for the next enumeration
 * const next = Partitions.recycle(6, generator.end());
 * ```
 */

import type { Logger } from "@ascent/core";
import { allocateBuffer, reclaimBuffer } from "./buffer.js";
import { parsePartitionInput, resolveGeneratorOptions, type GeneratorOptions } from "./config.js";
import { partitionInvariants } from "./invariants.js";
import { partitionPhaseMachine } from "./phases.js";
import {
  PartitionErrorCodes,
  PartitionInvariantError,
  type GeneratorPhase,
  type GeneratorStatus,
  type PartitionBuffer,
  type PartitionView,
} from "./types.js";

const OUTER: GeneratorPhase = Object.freeze({ kind: "outer" });

export class Partitions implements Iterable<number[]> {
  /** The integer being partitioned. */
  readonly n: number;

  private readonly logger: Logger;
  private readonly verify: boolean;

  /** Everything the generator owns; handed back by `end()`. */
  private readonly storage: PartitionBuffer;
  /** The `n + 1` slots the algorithm works in. */
  private readonly a: PartitionBuffer;
  /** Logical length of `a`; drops from 1 to 0 once the empty partition of 0 is out. */
  private length: number;

  private k: number;
  private y: number;
  private phaseState: GeneratorPhase = OUTER;

  private currentStatus: GeneratorStatus = partitionPhaseMachine.initial;
  private producedCount = 0;
  private released = false;

  /**
   * Prefer `Partitions.create` or `Partitions.recycle`.
   *
   * @param buffer - Caller's buffer to take over; see `Partitions.recycle`
   * @throws PartitionInvariantError with code INVALID_PARTITION_INPUT or INVALID_GENERATOR_OPTIONS
   */
  constructor(n: number, options: GeneratorOptions = {}, buffer?: PartitionBuffer) {
    this.n = parsePartitionInput(n);
    const { logger, verify } = resolveGeneratorOptions(options);
    this.logger = logger;
    this.verify = verify;

    const prepared = buffer === undefined ? allocateBuffer(this.n) : reclaimBuffer(this.n, buffer);
    this.storage = prepared.storage;
    this.a = prepared.work;
    this.length = this.n + 1;

    this.k = this.n === 0 ? 0 : 1;
    this.y = this.n === 0 ? 0 : this.n - 1;

    this.logger.debug("Generator created", {
      n: this.n,
      capacity: this.storage.length,
      recycled: prepared.reused,
    });
  }

  static create(n: number, options?: GeneratorOptions): Partitions {
    return new Partitions(n, options);
  }

  /**
   * Create a generator that takes over `buffer` instead of allocating.
   *
   * The first `n + 1` entries are zeroed and used; entries past them are left
   * alone. A buffer shorter than `n + 1` is dropped and a new one of exactly
   * `n + 1` entries is allocated. The produced sequence is the same as for
   * `new Partitions(n)`.
   *
   * When the buffer is kept, the generator works in it directly: the caller
   * must not read or write it through their own reference until `end()`
   * hands it back. Writes in between change what later partitions contain.
   */
  static recycle(n: number, buffer: PartitionBuffer, options?: GeneratorOptions): Partitions {
    return new Partitions(n, options, buffer);
  }

  /** Partitions produced so far. */
  get produced(): number {
    return this.producedCount;
  }

  get status(): GeneratorStatus {
    return this.currentStatus;
  }

  /** Where the next step resumes. */
  get phase(): GeneratorPhase {
    return this.phaseState;
  }

  /** Length of the buffer `end()` will return. */
  get capacity(): number {
    return this.storage.length;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Advance to the next partition.
   *
   * The returned view shares memory with the generator and is overwritten by
   * the next call. Returns `undefined` once every partition has been
   * produced, and on every call after that.
   *
   * In checked mode a failed check throws after the step has already moved
   * the state and overwritten the buffer, while `produced` and `status` keep
   * their values from before the call. Such a generator cannot be advanced
   * meaningfully; only `end()` remains useful, to take the buffer back.
   *
   * @throws PartitionInvariantError with code GENERATOR_RELEASED after `end()`
   * @throws PartitionInvariantError with a PARTITION_* code, or PhaseTransitionError,
   *   when a check fails in checked mode
   */
  next(): PartitionView | undefined {
    this.assertNotReleased("next");

    const from = this.currentStatus;
    const view = this.step();
    const to: GeneratorStatus = view === undefined ? "exhausted" : this.phaseState.kind;

    if (this.verify) {
      partitionPhaseMachine.assertTransition(from, to);
      if (view !== undefined) {
        partitionInvariants.assertAll(view, this.n);
      }
    }

    if (view === undefined) {
      if (from !== "exhausted") {
        this.logger.debug("Generator exhausted", { n: this.n, produced: this.producedCount });
      }
    } else {
      this.producedCount++;
    }

    this.currentStatus = to;
    return view;
  }

  /**
   * Like `next()`, but returns a copy the caller may keep.
   */
  nextOwned(): number[] | undefined {
    const view = this.next();
    return view === undefined ? undefined : Array.from(view);
  }

  *[Symbol.iterator](): Generator<number[], void, undefined> {
    for (let parts = this.nextOwned(); parts !== undefined; parts = this.nextOwned()) {
      yield parts;
    }
  }

  /**
   * Iterate views instead of copies. Each view is only valid until the
   * iterator is advanced.
   */
  *views(): Generator<PartitionView, void, undefined> {
    for (let view = this.next(); view !== undefined; view = this.next()) {
      yield view;
    }
  }

  /**
   * Release the generator and return its buffer for reuse.
   *
   * The contents of the returned buffer are leftovers of the algorithm.
   *
   * @throws PartitionInvariantError with code GENERATOR_RELEASED if already released
   */
  end(): PartitionBuffer {
    this.assertNotReleased("end");
    this.released = true;
    this.logger.debug("Generator released", {
      n: this.n,
      produced: this.producedCount,
      capacity: this.storage.length,
    });
    return this.storage;
  }

  private assertNotReleased(operation: string): void {
    if (this.released) {
      throw new PartitionInvariantError(
        PartitionErrorCodes.GENERATOR_RELEASED,
        `Cannot call ${operation}() on a generator whose buffer was returned by end()`,
        { n: this.n, operation, produced: this.producedCount }
      );
    }
  }

  /**
   * One transition of the state machine.
   *
   * Invariant between calls: `y` is `n` minus the sum of `a[0..k)`, and in
   * the inner phase `a[k] = x`, `a[l] = y` with `l = k + 1`.
   */
  private step(): PartitionView | undefined {
    const a = this.a;
    const phase = this.phaseState;

    if (phase.kind === "inner") {
      const x = phase.x + 1;
      const y = this.y - 1;
      const k = this.k;

      if (x <= y) {
        a[k] = x;
        a[phase.l] = y;
        this.y = y;
        this.phaseState = { kind: "inner", x, l: phase.l };
        return a.subarray(0, k + 2);
      }

      a[k] = x + y;
      this.y = x + y - 1;
      this.phaseState = OUTER;
      return a.subarray(0, k + 1);
    }

    if (this.k === 0) {
      // Only n = 0 starts with a single slot: emit the empty partition once.
      if (this.length === 1) {
        this.length = 0;
        return a.subarray(0, 0);
      }
      return undefined;
    }

    let k = this.k - 1;
    let y = this.y;
    const x = a[k] + 1;

    while (2 * x <= y) {
      a[k] = x;
      y -= x;
      k++;
    }

    const l = k + 1;
    this.k = k;

    if (x <= y) {
      a[k] = x;
      a[l] = y;
      this.y = y;
      this.phaseState = { kind: "inner", x, l };
      return a.subarray(0, k + 2);
    }

    a[k] = x + y;
    this.y = x + y - 1;
    return a.subarray(0, k + 1);
  }
}
