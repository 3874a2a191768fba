/**
 * Unit tests for the pentagonal-number oracle, and the generator against it.
 */
import { describe, it, expect } from "vitest";
import { countPartitions } from "../../src/enumerate.js";
import {
  MAX_EXACT_RECURRENCE_INPUT,
  partitionCountByRecurrence,
  partitionCountsUpTo,
} from "../../src/testing/index.js";

describe("partitionCountsUpTo", () => {
  it("starts with the small values of p(n)", () => {
    expect(partitionCountsUpTo(10)).toEqual([1, 1, 2, 3, 5, 7, 11, 15, 22, 30, 42]);
  });

  it("reaches p(100)", () => {
    expect(partitionCountByRecurrence(100)).toBe(190569292);
  });

  it("rejects inputs outside the exact range", () => {
    expect(() => partitionCountsUpTo(-1)).toThrow(RangeError);
    expect(() => partitionCountsUpTo(MAX_EXACT_RECURRENCE_INPUT + 1)).toThrow(RangeError);
  });
});

describe("generator against the recurrence", () => {
  it("agrees for n from 51 to 60", () => {
    const expected = partitionCountsUpTo(60);
    for (let n = 51; n <= 60; n++) {
      expect(countPartitions(n), `n = ${n}`).toBe(expected[n]);
    }
  });
});
