import { TestFailure } from '..';

/**
 * Runs an assertion that is expected to fail and returns the raised signal.
 * Any other exception propagates.
 */
export function captureFailure(assertion: () => unknown): TestFailure {
  try {
    assertion();
  } catch (error) {
    if (error instanceof TestFailure) return error;
    throw error;
  }
  throw new Error('Expected the assertion to fail');
}
