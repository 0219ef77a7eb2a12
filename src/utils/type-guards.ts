export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type TypeofMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  undefined: undefined;
  function: (...args: never[]) => unknown;
};

/**
 * Creates a guard for a `typeof` check.
 *
 * @template T  One of the keys of {@link TypeofMap}.
 * @param type  The keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof TypeofMap>(type: T): Guard<TypeofMap[T]> {
  return (value: unknown): value is TypeofMap[T] => typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is callable. */
export const isFunction = is('function');

/**
 * Guard verifying the value is `null` or `undefined`.
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Guard verifying the value is a thenable.
 *
 * Used to reject asynchronous procedures: a returned promise means the work
 * (and any rejection) happens after the synchronous call has returned.
 */
export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
