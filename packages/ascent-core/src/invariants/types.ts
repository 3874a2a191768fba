import type { UnknownRecord } from "../types.js";
import type { InvariantError } from "./InvariantError.js";

export type InvariantErrorConstructor<TCode extends string> = new (
  code: TCode,
  message: string,
  context?: UnknownRecord
) => InvariantError<TCode>;

/**
 * What a broken rule reports. `context` is absent when the rule defines none.
 */
export interface InvariantViolation<TCode extends string = string> {
  code: TCode;
  message: string;
  context?: UnknownRecord;
}

export type InvariantResult<TCode extends string = string> =
  | { valid: true }
  | { valid: false; violation: InvariantViolation<TCode> };

export type InvariantSetResult<TCode extends string = string> =
  | { valid: true }
  | { valid: false; violations: Array<InvariantViolation<TCode>> };

/**
 * A named predicate over `TState`. `TParams` are the extra arguments every
 * method takes, such as the `n` a partition must sum to.
 */
export interface Invariant<TState, TCode extends string = string, TParams extends unknown[] = []> {
  readonly name: string;
  readonly code: TCode;
  check(state: TState, ...params: TParams): boolean;
  /** @throws InvariantError subclass carrying `code` */
  assert(state: TState, ...params: TParams): void;
  validate(state: TState, ...params: TParams): InvariantResult<TCode>;
}

export interface InvariantSet<TState, TCode extends string = string, TParams extends unknown[] = []> {
  readonly invariants: ReadonlyArray<Invariant<TState, TCode, TParams>>;
  checkAll(state: TState, ...params: TParams): boolean;
  /** Throws for the first broken invariant, in declaration order. */
  assertAll(state: TState, ...params: TParams): void;
  /** Reports every broken invariant, in declaration order. */
  validateAll(state: TState, ...params: TParams): InvariantSetResult<TCode>;
}
