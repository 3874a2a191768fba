/**
 * Unit tests for partition invariants.
 */
import { describe, it, expect } from "vitest";
import { InvariantError } from "@ascent/core";
import {
  partitionInvariants,
  partsAreNonDecreasing,
  partsArePositive,
  partsSumToN,
} from "../../src/invariants.js";

describe("partsSumToN", () => {
  it("checks the sum against n", () => {
    expect(partsSumToN.check([1, 3], 4)).toBe(true);
    expect(partsSumToN.check([], 0)).toBe(true);
    expect(partsSumToN.check([1, 2], 4)).toBe(false);
  });

  it("reports the actual sum", () => {
    expect(partsSumToN.validate(Uint32Array.of(2, 2), 5)).toEqual({
      valid: false,
      violation: {
        code: "PARTITION_SUM_MISMATCH",
        message: "Parts sum to 4, expected 5",
        context: { parts: [2, 2], n: 5 },
      },
    });
  });
});

describe("partsArePositive", () => {
  it("rejects zero parts", () => {
    expect(partsArePositive.check([1, 1], 2)).toBe(true);
    expect(partsArePositive.check([0, 2], 2)).toBe(false);
  });

  it("names the first offending index", () => {
    const result = partsArePositive.validate([1, 0, 0], 1);

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.violation.message).toBe("Part at index 1 is 0, expected a positive integer");
  });
});

describe("partsAreNonDecreasing", () => {
  it("accepts equal neighbours", () => {
    expect(partsAreNonDecreasing.check([1, 2, 2, 5], 10)).toBe(true);
  });

  it("throws on the first descent", () => {
    try {
      partsAreNonDecreasing.assert([1, 3, 2], 6);
      expect.fail("Should have thrown");
    } catch (error) {
      if (!InvariantError.hasCode(error, "PARTITION_NOT_NON_DECREASING")) throw error;
      expect(error.name).toBe("PartitionInvariantError");
      expect(error.message).toBe("Part at index 2 is smaller than the part before it");
    }
  });
});

describe("partitionInvariants", () => {
  it("collects every violation in order", () => {
    const result = partitionInvariants.validateAll([3, 0], 4);

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.violations.map((violation) => violation.code)).toEqual([
      "PARTITION_SUM_MISMATCH",
      "PARTITION_NON_POSITIVE_PART",
      "PARTITION_NOT_NON_DECREASING",
    ]);
  });

  it("accepts a valid partition", () => {
    expect(partitionInvariants.checkAll([1, 1, 2], 4)).toBe(true);
    expect(() => partitionInvariants.assertAll([4], 4)).not.toThrow();
  });
});
