import { inspect } from 'node:util';

import { isContainer } from '../differ';

/**
 * Determines whether a value has a meaningful textual rendering.
 *
 * Displayable:
 * - primitives (except symbols), `null` and `undefined`,
 * - `Date`, `RegExp` and `Error` instances,
 * - plain objects and arrays,
 * - objects that define their own `toString` somewhere below `Object.prototype`.
 *
 * Functions, symbols and class instances relying on the default
 * `[object Object]` rendering are not displayable.
 */
export function isDisplayable(value: unknown): boolean {
  if (value === null) return true;

  if (typeof value === 'object') {
    if (value instanceof Date || value instanceof RegExp || value instanceof Error) {
      return true;
    }
    return isContainer(value) || hasCustomToString(value);
  }

  return typeof value !== 'symbol' && typeof value !== 'function';
}

function hasCustomToString(value: object): boolean {
  return value.toString !== Object.prototype.toString;
}

/**
 * Placeholder for a value that cannot be rendered.
 */
export const OPAQUE_VALUE = '<value>';

/**
 * Renders a displayable value on a single line.
 *
 * - Strings are quoted (`"abc"`), bigints carry the `n` suffix.
 * - Dates render as ISO strings; invalid dates as `Invalid Date`.
 * - Errors render as `Name: message`.
 * - Containers render through `util.inspect` without line breaks.
 * - A value whose own `toString` throws renders as `<value>`.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'bigint') return `${value}n`;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (value instanceof Error) return describeError(value);

  try {
    return isContainer(value)
      ? inspect(value, { depth: 4, breakLength: Infinity, sorted: false })
      : String(value);
  } catch {
    return OPAQUE_VALUE;
  }
}

/**
 * Describes a thrown value.
 *
 * - `Error` → `Name: message` (just `Name` when the message is empty).
 * - string → the string itself.
 * - object with a string `message` → that message.
 * - anything else → `Unknown error`.
 */
export function describeError(thrown: unknown): string {
  if (thrown instanceof Error) {
    return thrown.message ? `${thrown.name}: ${thrown.message}` : thrown.name;
  }
  if (typeof thrown === 'string') return thrown;
  if (
    typeof thrown === 'object' &&
    thrown !== null &&
    'message' in thrown &&
    typeof thrown.message === 'string'
  ) {
    return thrown.message;
  }
  return UNKNOWN_ERROR;
}

export const UNKNOWN_ERROR = 'Unknown error';
