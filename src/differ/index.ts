import type {
  Container,
  CycleEntry,
  Difference,
  LeafComparator
} from './types';

import {
  areRichValuesEqual,
  hasOwn,
  isContainer,
  isRichType,
  prependPath,
  readOwn,
  toPathSegment
} from './utils';

export type { Difference, PathSegment, LeafComparator } from './types';
export { formatPath, isContainer } from './utils';

/**
 * Checks if the pair of containers is already being compared further up the
 * current recursion path (a circular back-edge).
 */
function isCycleDetected(
  stack: readonly CycleEntry[],
  expected: Container,
  reached: Container
): boolean {
  return stack.some(
    ([seenExpected, seenReached]) =>
      seenExpected === expected && seenReached === reached
  );
}

/**
 * Default leaf comparison.
 *
 * Rich values compare by content, every other leaf by strict equality.
 */
export const compareLeaves: LeafComparator = (reached, expected) => {
  if (isRichType(reached) && isRichType(expected)) {
    return areRichValuesEqual(reached, expected);
  }
  return reached === expected;
};

/**
 * Iterates over the keys (or indices) of two containers and collects
 * differences.
 *
 * Logic:
 * 1. Expected keys:
 *    - Missing on the reached side → `REMOVE`.
 *    - Present on both sides and both values are containers of the same
 *      shape (array vs object) → recurse, unless the pair is a cycle.
 *    - Otherwise → leaf comparison, `CHANGE` on mismatch.
 * 2. Reached keys missing on the expected side → `CREATE`.
 *
 * Differences are emitted depth-first, in expected-key order, followed by
 * creations in reached-key order.
 */
function compareChildren(
  expected: Container,
  reached: Container,
  compareLeaf: LeafComparator,
  cycleStack: readonly CycleEntry[]
): Difference[] {
  const differences: Difference[] = [];
  const isArray = Array.isArray(expected);

  for (const key of Object.keys(expected)) {
    const expectedValue = readOwn(expected, key);
    const segment = toPathSegment(key, isArray);

    if (!hasOwn(reached, key)) {
      differences.push({ type: 'REMOVE', path: [segment], expected: expectedValue });
      continue;
    }

    const reachedValue = readOwn(reached, key);

    if (
      isContainer(expectedValue) &&
      isContainer(reachedValue) &&
      Array.isArray(expectedValue) === Array.isArray(reachedValue)
    ) {
      if (isCycleDetected(cycleStack, expectedValue, reachedValue)) continue;

      const nextStack = cycleStack.concat([[expectedValue, reachedValue]]);
      const childDifferences = compareChildren(
        expectedValue,
        reachedValue,
        compareLeaf,
        nextStack
      );
      differences.push(...prependPath(childDifferences, segment));
      continue;
    }

    if (!compareLeaf(reachedValue, expectedValue)) {
      differences.push({
        type: 'CHANGE',
        path: [segment],
        reached: reachedValue,
        expected: expectedValue
      });
    }
  }

  for (const key of Object.keys(reached)) {
    if (!hasOwn(expected, key)) {
      differences.push({
        type: 'CREATE',
        path: [toPathSegment(key, Array.isArray(reached))],
        reached: readOwn(reached, key)
      });
    }
  }

  return differences;
}

/**
 * Calculates the deep structural difference between an expected container
 * and the container an assertion actually reached.
 *
 * If the roots have different shapes (array vs object) a single root-level
 * `CHANGE` is returned.
 *
 * @param expected - The structure the assertion expects.
 * @param reached - The structure the code under test produced.
 * @param compareLeaf - Leaf equality; defaults to {@link compareLeaves}.
 * @returns An ordered list of differences; empty when the structures are equal.
 */
export function diff(
  expected: Container,
  reached: Container,
  compareLeaf: LeafComparator = compareLeaves
): Difference[] {
  if (Array.isArray(expected) !== Array.isArray(reached)) {
    return [{ type: 'CHANGE', path: [], reached, expected }];
  }
  return compareChildren(expected, reached, compareLeaf, [[expected, reached]]);
}
