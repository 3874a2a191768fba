/**
 * ## Phase Machine Types - Declared Lifecycle Transitions
 *
 * A phase machine lists, for every phase of a stateful component, the phases
 * it may move to next. Components consult it to validate their own
 * transitions, and tests use it to document the lifecycle.
 *
 * | Type | Purpose |
 * |------|---------|
 * | `PhaseMachineDefinition<TPhase>` | Initial phase + transition map |
 * | `PhaseMachine<TPhase>` | Instance with validation methods |
 * | `PhaseTransitionError` | Thrown for undeclared transitions |
 *
 * @example
 * ```typescript
 * type GeneratorStatus = "outer" | "inner" | "exhausted";
 *
 * const lifecycle: PhaseMachineDefinition<GeneratorStatus> = {
 *   initial: "outer",
 *   transitions: {
 *     outer: ["outer", "inner", "exhausted"],
 *     inner: ["inner", "outer"],
 *     exhausted: ["exhausted"],
 *   },
 * };
 * ```
 */

/**
 * Phase machine definition.
 *
 * @typeParam TPhase - Union of phase names (string literals)
 */
export interface PhaseMachineDefinition<TPhase extends string> {
  initial: TPhase;

  /**
   * Phase → allowed next phases. An empty array marks a terminal phase;
   * a phase that lists only itself is absorbing but not terminal.
   */
  transitions: Record<TPhase, readonly TPhase[]>;
}

/**
 * Phase machine created by `definePhaseMachine()`.
 */
export interface PhaseMachine<TPhase extends string> {
  readonly definition: PhaseMachineDefinition<TPhase>;

  readonly initial: TPhase;

  canTransition(from: TPhase, to: TPhase): boolean;

  /**
   * @throws PhaseTransitionError if `from → to` is not declared
   */
  assertTransition(from: TPhase, to: TPhase): void;

  validTransitions(from: TPhase): readonly TPhase[];

  /** True when the phase has no outgoing transitions. */
  isTerminal(phase: TPhase): boolean;

  /** True when the only outgoing transition is back to the phase itself. */
  isAbsorbing(phase: TPhase): boolean;

  isValidPhase(phase: string): phase is TPhase;
}

/**
 * Error thrown when an undeclared transition is attempted.
 */
export class PhaseTransitionError extends Error {
  readonly code = "PHASE_INVALID_TRANSITION";
  readonly from: string;
  readonly to: string;
  readonly validTransitions: readonly string[];

  constructor(from: string, to: string, validTransitions: readonly string[]) {
    const validList =
      validTransitions.length > 0 ? validTransitions.join(", ") : "(none - terminal phase)";
    super(`Invalid phase transition from "${from}" to "${to}". Valid transitions: ${validList}`);
    this.name = "PhaseTransitionError";
    this.from = from;
    this.to = to;
    this.validTransitions = validTransitions;
    Object.setPrototypeOf(this, PhaseTransitionError.prototype);
  }
}
