import type { WeightTable } from "./types.js";

const MIN_WEIGHT = 1;

/**
 * Weights must be integers of at least 1. Anything lower (or not a finite
 * number) is raised to 1; fractions are truncated first.
 */
export function normalizeWeight(weight: number): number {
  if (!Number.isFinite(weight)) {
    return MIN_WEIGHT;
  }
  return Math.max(MIN_WEIGHT, Math.trunc(weight));
}

/**
 * Divisors of `value`, largest first: `value` itself, then every integer
 * from `value / 2` down to 1 that divides it.
 */
export function getDivisors(value: number): number[] {
  if (value <= MIN_WEIGHT) {
    return [];
  }
  const divisors = [value];
  for (let count = Math.floor(value / 2); count > 0; count--) {
    if (value % count === 0) {
      divisors.push(count);
    }
  }
  return divisors;
}

/**
 * Largest divisor of the minimum weight that divides every weight.
 *
 * Only the divisors of the minimum weight are searched.
 */
export function reductionFactor(weights: Iterable<number>): number {
  const values = Array.from(weights, normalizeWeight);
  if (!values.length) {
    return MIN_WEIGHT;
  }
  const min = Math.min(...values);
  if (min <= MIN_WEIGHT) {
    return MIN_WEIGHT;
  }

  for (const divisor of getDivisors(min)) {
    if (values.every((value) => value % divisor === 0)) {
      return divisor;
    }
  }
  return MIN_WEIGHT;
}

/**
 * Expand a weight table into the sequence round-robin walks through.
 *
 * Each target appears `weight / reductionFactor` times, in table order, with
 * its repeats next to each other. Returns `undefined` when there is no
 * target at all.
 *
 * @example
 * ```ts
 * buildElectionSequence(new Map([["a:1", 2], ["b:1", 4]]));
 * // ["a:1", "b:1", "b:1"]
 * ```
 */
export function buildElectionSequence(
  weights: WeightTable | undefined,
): string[] | undefined {
  if (!weights || weights.size === 0) {
    return undefined;
  }
  if (weights.size === 1) {
    return Array.from(weights.keys());
  }

  const factor = reductionFactor(weights.values());
  const sequence: string[] = [];
  for (const [target, weight] of weights) {
    const count = normalizeWeight(weight) / factor;
    for (let i = 0; i < count; i++) {
      sequence.push(target);
    }
  }
  return sequence;
}
