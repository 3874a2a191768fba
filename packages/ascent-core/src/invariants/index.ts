export { InvariantError } from "./InvariantError.js";
export type {
  Invariant,
  InvariantErrorConstructor,
  InvariantResult,
  InvariantSet,
  InvariantSetResult,
  InvariantViolation,
} from "./types.js";
export { createInvariant, type InvariantConfig } from "./createInvariant.js";
export { createInvariantSet } from "./createInvariantSet.js";
