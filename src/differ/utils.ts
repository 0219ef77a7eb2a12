import type { Container, Difference, PathSegment } from './types';

/**
 * Internal tag strings for "Rich" built-in types that are treated as atomic
 * values rather than traversable containers.
 *
 * Uses the tags returned by `Object.prototype.toString` instead of
 * `constructor.name`, which minifiers rename and callers can overwrite.
 */
const Tag = {
  String: '[object String]',
  Number: '[object Number]',
  Boolean: '[object Boolean]',
  BigInt: '[object BigInt]',
  Date: '[object Date]',
  RegExp: '[object RegExp]'
} as const;

const RICH_TYPES = new Set<string>(Object.values(Tag));

function tagOf(value: object): string {
  return Object.prototype.toString.call(value);
}

/**
 * Determines if a value is a "Rich" built-in type
 * (Date, RegExp, or a boxed String, Number, Boolean, BigInt).
 */
export function isRichType(value: unknown): value is object {
  return typeof value === 'object' && value !== null && RICH_TYPES.has(tagOf(value));
}

/**
 * Determines if a value is a traversable container.
 *
 * Only arrays and objects whose prototype is `Object.prototype` or `null`
 * qualify. Class instances, maps, sets and rich types are leaves: their
 * internal state is not reachable through enumerable own keys.
 */
export function isContainer(value: unknown): value is Container {
  if (Array.isArray(value)) return true;
  if (typeof value !== 'object' || value === null) return false;
  if (isRichType(value)) return false;

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Compares two rich values by content.
 *
 * - Boxed primitives compare by their unboxed value (two NaN are equal).
 * - `Date` compares by timestamp.
 * - `RegExp` compares by source and flags.
 *
 * @returns `true` if both objects share a tag and represent the same value.
 */
export function areRichValuesEqual(left: object, right: object): boolean {
  const leftTag = tagOf(left);
  if (leftTag !== tagOf(right)) return false;

  switch (leftTag) {
    case Tag.Number: {
      const leftValue = Number(left);
      const rightValue = Number(right);
      if (Number.isNaN(leftValue)) return Number.isNaN(rightValue);
      return leftValue === rightValue;
    }
    case Tag.Date:
      return Number(left) === Number(right);
    case Tag.String:
    case Tag.Boolean:
    case Tag.BigInt:
      return left.valueOf() === right.valueOf();
    case Tag.RegExp:
      return String(left) === String(right);
    default:
      return false;
  }
}

/**
 * Reads an own enumerable property without walking the prototype chain.
 */
export function readOwn(container: Container, key: string): unknown {
  return Object.getOwnPropertyDescriptor(container, key)?.value;
}

export function hasOwn(container: Container, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(container, key);
}

/**
 * Converts an object key to a path segment; array indices become numbers.
 */
export function toPathSegment(key: string, isArray: boolean): PathSegment {
  return isArray ? Number(key) : key;
}

/**
 * Prepends a segment to every difference path.
 *
 * Paths are built bottom-up while the recursion unwinds, so segment arrays
 * are only allocated for nodes that actually differ.
 */
export function prependPath(
  differences: Difference[],
  segment: PathSegment
): Difference[] {
  for (const difference of differences) {
    difference.path.unshift(segment);
  }
  return differences;
}

/**
 * Formats a key path for display: `["users", 0, "name"]` → `users.0.name`.
 * The empty path (the compared root itself) is rendered as `(root)`.
 */
export function formatPath(path: readonly PathSegment[]): string {
  return path.length === 0 ? '(root)' : path.join('.');
}
