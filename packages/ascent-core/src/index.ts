/**
 * @ascent/core
 *
 * Shared infrastructure for the ascent packages: scoped logging, coded
 * invariant errors, and phase machines.
 *
 * @module @ascent/core
 */

export type { UnknownRecord } from "./types.js";

// Logging
export type { Logger, LogLevel } from "./logging/index.js";
export { LOG_LEVELS, createScopedLogger, createNoOpLogger, formatLogLine } from "./logging/index.js";

// Invariants
export type {
  Invariant,
  InvariantConfig,
  InvariantErrorConstructor,
  InvariantResult,
  InvariantSet,
  InvariantSetResult,
  InvariantViolation,
} from "./invariants/index.js";
export { InvariantError, createInvariant, createInvariantSet } from "./invariants/index.js";

// Phase machines
export type { PhaseMachine, PhaseMachineDefinition } from "./fsm/index.js";
export { PhaseTransitionError, definePhaseMachine } from "./fsm/index.js";
