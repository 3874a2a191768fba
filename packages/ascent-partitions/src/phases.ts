/**
 * Declared lifecycle of a partition generator.
 *
 * `exhausted` is absorbing: once `next()` returns `undefined` it keeps doing
 * so. An `inner` step never exhausts the generator directly; it always
 * falls back to `outer` first.
 */

import { definePhaseMachine } from "@ascent/core";
import type { GeneratorStatus } from "./types.js";

export const partitionPhaseMachine = definePhaseMachine<GeneratorStatus>({
  initial: "outer",
  transitions: {
    outer: ["outer", "inner", "exhausted"],
    inner: ["inner", "outer"],
    exhausted: ["exhausted"],
  },
});
