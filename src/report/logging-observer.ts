import type { Logger } from '../logger';
import type { ScenarioObserver } from '../runner';
import { TestOutcome, formatOutcome } from '../test-case';

/**
 * Observer that writes one log line per finished test case: `warn` for
 * failed and errored cases (with their message), `info` otherwise.
 */
export function createLoggingObserver(logger: Logger): ScenarioObserver {
  return {
    update(testCase) {
      const fields = {
        label: testCase.label,
        outcome: formatOutcome(testCase.outcome),
        durationMs: testCase.durationMs
      };

      switch (testCase.outcome) {
        case TestOutcome.Failed:
        case TestOutcome.Errored:
          logger.warn({ ...fields, reason: testCase.message }, 'Ran test case');
          break;
        case TestOutcome.Skipped:
          logger.info({ ...fields, reason: testCase.message }, 'Skipped test case');
          break;
        default:
          logger.info(fields, 'Ran test case');
      }
    }
  };
}
