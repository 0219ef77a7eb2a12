import {
  type TestFailure,
  UNKNOWN_ERROR,
  describeError,
  isTestFailure
} from '../assertion';
import { type Clock, systemClock } from '../clock';
import { isPromiseLike } from '../utils/type-guards';
import { TestOutcome } from './outcome';

/**
 * The deferred unit of work a test case owns.
 */
export type TestProcedure = () => void;

/**
 * Read-only view of a test case, handed to observers and reporting.
 */
export interface TestCaseView {
  readonly kind: TestCase['kind'];
  readonly label: string;
  readonly outcome: TestOutcome;
  /**
   * Wall-clock time spent inside the procedure, in milliseconds.
   */
  readonly durationMs: number;
  /**
   * Failure reason, error description or skip reason, depending on `outcome`.
   */
  readonly message: string | undefined;
}

type TestCaseBase = {
  readonly label: string;
  readonly procedure: TestProcedure;
  outcome: TestOutcome;
  durationMs: number;
  message: string | undefined;
};

export type RunnableTestCase = TestCaseBase & {
  readonly kind: 'runnable';
};

/**
 * A case registered with the intention of never executing its procedure.
 */
export type SkippedTestCase = TestCaseBase & {
  readonly kind: 'skipped';
  readonly reason: string | undefined;
};

export type TestCase = RunnableTestCase | SkippedTestCase;

/**
 * The single assignment `runTestCase` makes to a case.
 */
type Settlement = {
  outcome: TestOutcome;
  durationMs: number;
  message: string | undefined;
};

export const ASYNC_PROCEDURE_MESSAGE = 'Asynchronous test procedures are not supported';

export function createTestCase(label: string, procedure: TestProcedure): RunnableTestCase {
  return {
    kind: 'runnable',
    label,
    procedure,
    outcome: TestOutcome.NotRun,
    durationMs: 0,
    message: undefined
  };
}

export function createSkippedTestCase(
  label: string,
  procedure: TestProcedure,
  reason?: string
): SkippedTestCase {
  return {
    kind: 'skipped',
    label,
    procedure,
    reason,
    outcome: TestOutcome.NotRun,
    durationMs: 0,
    message: undefined
  };
}

/**
 * Executes a procedure inside the failure boundary and classifies the result.
 *
 * Logic:
 * 1. Timing:
 *    The clock is read immediately before the call and immediately after it
 *    returns or throws; classification happens outside that window.
 * 2. Classification:
 *    - returns normally → `passed`
 *    - throws a `TestFailure` → `failed`, message = rendered failure
 *    - throws anything else → `errored`, message = error description
 *    - returns a promise → `errored`: the work escapes the synchronous call
 */
function execute(procedure: TestProcedure, clock: Clock): Settlement {
  let returned: unknown;
  let thrown: { error: unknown } | undefined;

  const start = clock.now();
  try {
    returned = procedure();
  } catch (error) {
    thrown = { error };
  }
  const durationMs = clock.now() - start;

  if (thrown) {
    const { error } = thrown;
    return isTestFailure(error)
      ? { outcome: TestOutcome.Failed, durationMs, message: renderFailure(error) }
      : { outcome: TestOutcome.Errored, durationMs, message: describeThrown(error) };
  }

  if (isPromiseLike(returned)) {
    return { outcome: TestOutcome.Errored, durationMs, message: ASYNC_PROCEDURE_MESSAGE };
  }

  return { outcome: TestOutcome.Passed, durationMs, message: undefined };
}

// Rendering reads user values (getters, `toString`); it must not escape the boundary.
function renderFailure(failure: TestFailure): string {
  try {
    return failure.render();
  } catch {
    return failure.message;
  }
}

function describeThrown(error: unknown): string {
  try {
    return describeError(error);
  } catch {
    return UNKNOWN_ERROR;
  }
}

/**
 * Whether the case already holds a terminal outcome.
 */
export function hasRun(testCase: TestCaseView): boolean {
  return testCase.outcome !== TestOutcome.NotRun;
}

/**
 * Runs a test case once and records its outcome, duration and message.
 *
 * A skipped case never invokes its procedure: it becomes `skipped` with a
 * zero duration and its reason as message.
 *
 * @throws If the case has already run.
 */
export function runTestCase(testCase: TestCase, clock: Clock = systemClock): void {
  if (hasRun(testCase)) {
    throw new Error(`Test case "${testCase.label}" has already run.`);
  }

  const settlement: Settlement =
    testCase.kind === 'skipped'
      ? { outcome: TestOutcome.Skipped, durationMs: 0, message: testCase.reason }
      : execute(testCase.procedure, clock);

  testCase.outcome = settlement.outcome;
  testCase.durationMs = settlement.durationMs;
  testCase.message = settlement.message;
}
