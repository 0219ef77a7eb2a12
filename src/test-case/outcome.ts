/**
 * Terminal classification of a test case.
 *
 * `NotRun` is the only pre-run state; every other value is terminal for a
 * given execution.
 */
export const TestOutcome = {
  Passed: 'passed',
  Failed: 'failed',
  Errored: 'errored',
  Skipped: 'skipped',
  NotRun: 'not-run'
} as const;

export type TestOutcome = (typeof TestOutcome)[keyof typeof TestOutcome];

/**
 * The outcomes a case can end with after running.
 */
export type TerminalOutcome = Exclude<TestOutcome, typeof TestOutcome.NotRun>;

const LABELS: Record<TestOutcome, string> = {
  passed: 'PASSED',
  failed: 'FAILED',
  errored: 'ERROR',
  skipped: 'SKIPPED',
  'not-run': 'NOT RUN YET'
};

/**
 * Display label for an outcome (e.g. `errored` → `ERROR`).
 */
export function formatOutcome(outcome: TestOutcome): string {
  return LABELS[outcome];
}

export function isTerminalOutcome(outcome: TestOutcome): outcome is TerminalOutcome {
  return outcome !== TestOutcome.NotRun;
}
