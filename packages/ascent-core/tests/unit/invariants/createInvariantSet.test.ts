/**
 * Unit tests for createInvariantSet.
 */
import { describe, it, expect } from "vitest";
import { createInvariant } from "../../../src/invariants/createInvariant.js";
import { createInvariantSet } from "../../../src/invariants/createInvariantSet.js";
import { InvariantError } from "../../../src/invariants/InvariantError.js";

type RunErrorCode = "RUN_TOO_SHORT" | "RUN_HAS_ZERO" | "RUN_TOO_LONG";

const RunInvariantError = InvariantError.forContext<RunErrorCode>("Run");

const longEnough = createInvariant<readonly number[], RunErrorCode, [number]>(
  {
    name: "longEnough",
    code: "RUN_TOO_SHORT",
    check: (run, min) => run.length >= min,
    message: (run, min) => `Run has ${run.length} values, needs ${min}`,
    context: (run, min) => ({ length: run.length, min }),
  },
  RunInvariantError
);

const noZeros = createInvariant<readonly number[], RunErrorCode, [number]>(
  {
    name: "noZeros",
    code: "RUN_HAS_ZERO",
    check: (run) => !run.includes(0),
    message: () => "Run contains a zero",
  },
  RunInvariantError
);

const notTooLong = createInvariant<readonly number[], RunErrorCode, [number]>(
  {
    name: "notTooLong",
    code: "RUN_TOO_LONG",
    check: (run, min) => run.length <= min * 2,
    message: (run) => `Run has ${run.length} values`,
  },
  RunInvariantError
);

const runInvariants = createInvariantSet([longEnough, noZeros, notTooLong]);

describe("createInvariantSet", () => {
  it("copies and freezes its members", () => {
    const members = [longEnough, noZeros];
    const set = createInvariantSet(members);
    members.push(notTooLong);

    expect(Object.isFrozen(set.invariants)).toBe(true);
    expect(set.invariants.map((invariant) => invariant.name)).toEqual(["longEnough", "noZeros"]);
  });

  it("checkAll is true only when every member holds", () => {
    expect(runInvariants.checkAll([1, 2, 3], 2)).toBe(true);
    expect(runInvariants.checkAll([1, 0, 3], 2)).toBe(false);
  });

  it("assertAll throws for the first broken member", () => {
    try {
      runInvariants.assertAll([0], 2);
      expect.fail("Should have thrown");
    } catch (error) {
      expect(InvariantError.hasCode(error, "RUN_TOO_SHORT")).toBe(true);
    }
  });

  it("validateAll lists every violation in member order", () => {
    expect(runInvariants.validateAll([0], 3)).toEqual({
      valid: false,
      violations: [
        { code: "RUN_TOO_SHORT", message: "Run has 1 values, needs 3", context: { length: 1, min: 3 } },
        { code: "RUN_HAS_ZERO", message: "Run contains a zero" },
      ],
    });
    expect(runInvariants.validateAll([0, 1, 2, 3, 4], 2)).toEqual({
      valid: false,
      violations: [
        { code: "RUN_HAS_ZERO", message: "Run contains a zero" },
        { code: "RUN_TOO_LONG", message: "Run has 5 values" },
      ],
    });
  });

  it("an empty set is always valid", () => {
    expect(createInvariantSet<number[], RunErrorCode>([]).validateAll([])).toEqual({ valid: true });
  });
});
