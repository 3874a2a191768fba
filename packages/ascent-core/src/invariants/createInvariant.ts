import type { UnknownRecord } from "../types.js";
import type {
  Invariant,
  InvariantErrorConstructor,
  InvariantResult,
  InvariantViolation,
} from "./types.js";

export interface InvariantConfig<TState, TCode extends string, TParams extends unknown[] = []> {
  name: string;
  code: TCode;
  check: (state: TState, ...params: TParams) => boolean;
  message: (state: TState, ...params: TParams) => string;
  context?: (state: TState, ...params: TParams) => UnknownRecord;
}

/**
 * Build an invariant from a predicate and the way to describe its failure.
 *
 * The message and context are only computed once the predicate has failed,
 * so a passing `check` costs exactly the predicate.
 *
 * @example
 * ```typescript
 * const fitsBuffer = createInvariant<Uint32Array, PartitionErrorCode, [number]>(
 *   {
 *     name: "fitsBuffer",
 *     code: "INVALID_PARTITION_INPUT",
 *     check: (buffer, n) => buffer.length > n,
 *     message: (buffer, n) => `Buffer of ${buffer.length} cannot hold ${n + 1} slots`,
 *   },
 *   PartitionInvariantError
 * );
 * ```
 */
export function createInvariant<TState, TCode extends string, TParams extends unknown[] = []>(
  config: InvariantConfig<TState, TCode, TParams>,
  ErrorClass: InvariantErrorConstructor<TCode>
): Invariant<TState, TCode, TParams> {
  const describeViolation = (state: TState, params: TParams): InvariantViolation<TCode> => {
    const violation: InvariantViolation<TCode> = {
      code: config.code,
      message: config.message(state, ...params),
    };
    const context = config.context?.(state, ...params);
    if (context !== undefined) {
      violation.context = context;
    }
    return violation;
  };

  return {
    name: config.name,
    code: config.code,
    check: config.check,

    assert(state: TState, ...params: TParams): void {
      if (config.check(state, ...params)) return;
      const { code, message, context } = describeViolation(state, params);
      throw new ErrorClass(code, message, context);
    },

    validate(state: TState, ...params: TParams): InvariantResult<TCode> {
      return config.check(state, ...params)
        ? { valid: true }
        : { valid: false, violation: describeViolation(state, params) };
    },
  };
}
