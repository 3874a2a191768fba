import type { Invariant, InvariantSet, InvariantSetResult, InvariantViolation } from "./types.js";

/**
 * Group invariants that take the same state and parameters.
 *
 * @example
 * ```typescript
 * const partitionInvariants = createInvariantSet([partsSumToN, partsArePositive]);
 * partitionInvariants.assertAll(view, n);
 * ```
 */
export function createInvariantSet<TState, TCode extends string, TParams extends unknown[] = []>(
  invariants: ReadonlyArray<Invariant<TState, TCode, TParams>>
): InvariantSet<TState, TCode, TParams> {
  const members = Object.freeze([...invariants]);

  return {
    invariants: members,

    checkAll: (state, ...params) => members.every((member) => member.check(state, ...params)),

    assertAll(state: TState, ...params: TParams): void {
      members.forEach((member) => member.assert(state, ...params));
    },

    validateAll(state: TState, ...params: TParams): InvariantSetResult<TCode> {
      const violations: Array<InvariantViolation<TCode>> = [];
      for (const member of members) {
        const result = member.validate(state, ...params);
        if (!result.valid) violations.push(result.violation);
      }
      return violations.length === 0 ? { valid: true } : { valid: false, violations };
    },
  };
}
