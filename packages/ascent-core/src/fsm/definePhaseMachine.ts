/**
 * ## definePhaseMachine - Lifecycle Declaration Factory
 *
 * Creates a phase machine from a definition. Transition targets are copied
 * into per-phase sets up front, so every check is a constant-time lookup
 * and can sit on a hot path.
 *
 * | Method | Returns | Purpose |
 * |--------|---------|---------|
 * | `canTransition(from, to)` | `boolean` | Check if declared |
 * | `assertTransition(from, to)` | `void` | Throw if undeclared |
 * | `validTransitions(from)` | `TPhase[]` | List targets |
 * | `isTerminal(phase)` | `boolean` | No outgoing transitions |
 * | `isAbsorbing(phase)` | `boolean` | Only a self-transition |
 * | `isValidPhase(phase)` | `boolean` | Type guard |
 *
 * @example
 * ```typescript
 * import { definePhaseMachine } from "@ascent/core";
 *
 * type GeneratorStatus = "outer" | "inner" | "exhausted";
 *
 * export const lifecycle = definePhaseMachine<GeneratorStatus>({
 *   initial: "outer",
 *   transitions: {
 *     outer: ["outer", "inner", "exhausted"],
 *     inner: ["inner", "outer"],
 *     exhausted: ["exhausted"],
 *   },
 * });
 *
 * lifecycle.assertTransition("inner", "exhausted"); // throws PhaseTransitionError
 * lifecycle.isAbsorbing("exhausted");               // true
 * ```
 */

import type { PhaseMachine, PhaseMachineDefinition } from "./types.js";
import { PhaseTransitionError } from "./types.js";

/**
 * Create a phase machine from a definition.
 */
export function definePhaseMachine<TPhase extends string>(
  definition: PhaseMachineDefinition<TPhase>
): PhaseMachine<TPhase> {
  const targets = new Map<string, ReadonlySet<string>>();
  for (const [from, allowed] of Object.entries<readonly TPhase[]>(definition.transitions)) {
    targets.set(from, new Set<string>(allowed));
  }

  const validTransitions = (from: TPhase): readonly TPhase[] => definition.transitions[from] ?? [];

  return {
    definition,
    initial: definition.initial,

    canTransition(from: TPhase, to: TPhase): boolean {
      return targets.get(from)?.has(to) ?? false;
    },

    assertTransition(from: TPhase, to: TPhase): void {
      if (!targets.get(from)?.has(to)) {
        throw new PhaseTransitionError(from, to, validTransitions(from));
      }
    },

    validTransitions,

    isTerminal(phase: TPhase): boolean {
      return validTransitions(phase).length === 0;
    },

    isAbsorbing(phase: TPhase): boolean {
      const allowed = validTransitions(phase);
      return allowed.length === 1 && allowed[0] === phase;
    },

    isValidPhase(phase: string): phase is TPhase {
      return targets.has(phase);
    },
  };
}
