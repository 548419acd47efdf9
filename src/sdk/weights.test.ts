import { describe, it, expect } from "@jest/globals";
import {
  buildElectionSequence,
  getDivisors,
  normalizeWeight,
  reductionFactor,
} from "./weights.js";

describe("normalizeWeight", () => {
  it("should keep weights of at least 1", () => {
    expect(normalizeWeight(1)).toBe(1);
    expect(normalizeWeight(7)).toBe(7);
  });

  it("should raise weights below 1 to 1", () => {
    expect(normalizeWeight(0)).toBe(1);
    expect(normalizeWeight(-5)).toBe(1);
    expect(normalizeWeight(0.4)).toBe(1);
  });

  it("should truncate fractional weights", () => {
    expect(normalizeWeight(2.7)).toBe(2);
  });

  it("should treat non-finite weights as 1", () => {
    expect(normalizeWeight(Number.NaN)).toBe(1);
    expect(normalizeWeight(Number.POSITIVE_INFINITY)).toBe(1);
  });
});

describe("getDivisors", () => {
  it("should list divisors largest first", () => {
    expect(getDivisors(12)).toEqual([12, 6, 4, 3, 2, 1]);
    expect(getDivisors(7)).toEqual([7, 1]);
    expect(getDivisors(2)).toEqual([2, 1]);
  });

  it("should return nothing for 1 or less", () => {
    expect(getDivisors(1)).toEqual([]);
    expect(getDivisors(0)).toEqual([]);
  });
});

describe("reductionFactor", () => {
  it("should be 1 when the smallest weight is 1", () => {
    expect(reductionFactor([1, 4, 6])).toBe(1);
  });

  it("should pick the largest divisor of the minimum shared by all weights", () => {
    expect(reductionFactor([2, 2])).toBe(2);
    expect(reductionFactor([3, 6])).toBe(3);
    expect(reductionFactor([4, 6])).toBe(2);
    expect(reductionFactor([6, 9, 15])).toBe(3);
  });

  it("should fall back to 1 for coprime weights", () => {
    expect(reductionFactor([5, 7])).toBe(1);
  });

  it("should clamp weights before searching", () => {
    expect(reductionFactor([0, 4])).toBe(1);
  });
});

describe("buildElectionSequence", () => {
  it("should signal an empty table with undefined", () => {
    expect(buildElectionSequence(new Map())).toBeUndefined();
    expect(buildElectionSequence(undefined)).toBeUndefined();
  });

  it("should return a single target once whatever its weight", () => {
    expect(buildElectionSequence(new Map([["a:1", 5]]))).toEqual(["a:1"]);
    expect(buildElectionSequence(new Map([["a:1", 0]]))).toEqual(["a:1"]);
  });

  it("should reduce equal weights to one entry each", () => {
    const sequence = buildElectionSequence(
      new Map([
        ["a:1", 2],
        ["b:1", 2],
      ]),
    );
    expect(sequence).toEqual(["a:1", "b:1"]);
  });

  it("should expand each target weight / factor times", () => {
    const weights = new Map([
      ["a:1", 3],
      ["b:1", 6],
    ]);
    const factor = reductionFactor(weights.values());

    expect(factor).toBe(3);
    for (const weight of weights.values()) {
      expect(weight % factor).toBe(0);
    }
    expect(buildElectionSequence(weights)).toEqual(["a:1", "b:1", "b:1"]);
  });

  it("should keep repeats contiguous in table order", () => {
    const sequence = buildElectionSequence(
      new Map([
        ["b:1", 6],
        ["a:1", 4],
      ]),
    );
    expect(sequence).toEqual(["b:1", "b:1", "b:1", "a:1", "a:1"]);
  });

  it("should clamp weights below 1 before expanding", () => {
    const sequence = buildElectionSequence(
      new Map([
        ["a:1", 0],
        ["b:1", -3],
        ["c:1", 2],
      ]),
    );
    expect(sequence).toEqual(["a:1", "b:1", "c:1", "c:1"]);
  });
});
