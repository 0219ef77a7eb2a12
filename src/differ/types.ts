/**
 * A single segment of a key path: string keys for objects, numeric indices
 * for arrays.
 */
export type PathSegment = string | number;

/**
 * Shared properties common to all difference events.
 */
type DifferenceBase = {
  /**
   * The key path from the compared root to this node (e.g., `["users", 0, "name"]`).
   */
  path: PathSegment[];
};

/**
 * A key that exists in the reached value but not in the expected one.
 */
export type DifferenceCreate = DifferenceBase & {
  type: 'CREATE';
  /**
   * The unexpected value found in the reached structure.
   */
  reached: unknown;
};

/**
 * A key that exists in the expected value but is missing from the reached one.
 */
export type DifferenceRemove = DifferenceBase & {
  type: 'REMOVE';
  /**
   * The expected value that is missing.
   */
  expected: unknown;
};

/**
 * A key present on both sides whose values are not equal.
 */
export type DifferenceChange = DifferenceBase & {
  type: 'CHANGE';
  reached: unknown;
  expected: unknown;
};

/**
 * Union of all difference events emitted by {@link diff}.
 */
export type Difference = DifferenceCreate | DifferenceRemove | DifferenceChange;

/**
 * A traversable structure: a plain object (or null-prototype object) or an
 * array. Anything else is a leaf.
 */
export type Container = Record<string, unknown> | unknown[];

/**
 * A pair of containers currently on the recursion path.
 */
export type CycleEntry = readonly [expected: Container, reached: Container];

/**
 * Decides whether two leaves are equal. Containers never reach this function.
 */
export type LeafComparator = (reached: unknown, expected: unknown) => boolean;
