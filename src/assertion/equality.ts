import { type Difference, compareLeaves, diff, isContainer } from '../differ';
import { InvalidToleranceError } from '../errors';

/**
 * A value that decides its own equality, the counterpart of an overloaded
 * equality operator.
 */
export interface Equatable<T = unknown> {
  equals(other: T): boolean;
}

export function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'equals' in value &&
    typeof value.equals === 'function'
  );
}

/**
 * Result of an exact equality check. `differences` is set when both sides
 * were compared structurally.
 */
export type EqualityResult = {
  equal: boolean;
  differences?: readonly Difference[];
};

/**
 * Leaf comparison used inside structural diffs: `Equatable` leaves decide
 * for themselves, everything else falls back to the differ's default.
 */
function compareEquatableLeaves(reached: unknown, expected: unknown): boolean {
  if (isEquatable(reached)) return reached.equals(expected);
  return compareLeaves(reached, expected);
}

/**
 * Exact equality between a reached and an expected value.
 *
 * Logic:
 * 1. `Equatable` reached values decide via `equals(expected)`.
 * 2. Two containers (plain objects or arrays) compare structurally; the
 *    differences are returned for failure rendering.
 * 3. Any other pair compares as a leaf: rich values (Date, RegExp, boxed
 *    primitives) by content, everything else with `===`.
 */
export function checkEquality(reached: unknown, expected: unknown): EqualityResult {
  if (isEquatable(reached)) {
    return { equal: reached.equals(expected) };
  }

  if (isContainer(reached) && isContainer(expected)) {
    const differences = diff(expected, reached, compareEquatableLeaves);
    return { equal: differences.length === 0, differences };
  }

  return { equal: compareLeaves(reached, expected) };
}

/**
 * Validates a tolerance band.
 *
 * @throws {InvalidToleranceError} If `tolerance` is negative or NaN.
 */
export function assertValidTolerance(tolerance: number): void {
  if (Number.isNaN(tolerance) || tolerance < 0) {
    throw new InvalidToleranceError(tolerance);
  }
}

/**
 * `|reached - expected| <= tolerance`.
 *
 * @throws {InvalidToleranceError} If `tolerance` is negative or NaN.
 */
export function isWithinTolerance(
  reached: number,
  expected: number,
  tolerance: number
): boolean {
  assertValidTolerance(tolerance);
  return Math.abs(reached - expected) <= tolerance;
}

/**
 * Folds both sides through the same case normalisation before comparing.
 */
export function equalsIgnoringCase(reached: string, expected: string): boolean {
  return reached.toLowerCase() === expected.toLowerCase();
}
