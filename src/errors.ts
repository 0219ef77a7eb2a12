/**
 * Raised when an equality tolerance is negative or not a number.
 *
 * This is a logic error in the test itself, not an assertion outcome: a case
 * that raises it is classified as errored.
 */
export class InvalidToleranceError extends RangeError {
  override readonly name = 'InvalidToleranceError';

  constructor(readonly tolerance: number) {
    super(`Tolerance must be a non-negative number, received ${tolerance}.`);
  }
}

/**
 * Raised when suite options cannot be resolved.
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}
