/**
 * Phase machines: declared lifecycles for stateful components.
 */

export type { PhaseMachineDefinition, PhaseMachine } from "./types.js";
export { PhaseTransitionError } from "./types.js";
export { definePhaseMachine } from "./definePhaseMachine.js";
