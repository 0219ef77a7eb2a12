import { describe, expect, test } from 'vitest';

import { createSteppingClock, silentLogger } from '../../tests/helpers';
import { assertThat } from '../../assertion';
import { type TestSuite, createTestSuite } from '../../suite';
import { formatDuration, formatScenarioSummary } from '..';

function createMathSuite(): TestSuite {
  const suite = createTestSuite({ clock: createSteppingClock(), logger: silentLogger });
  suite.declareScenario('Math', scenario => {
    scenario
      .test('adds', () => {
        assertThat(1 + 1).isEqualTo(2);
      })
      .test('divides', () => {
        assertThat(7 / 2).isEqualTo(3);
      })
      .skip('not ready', 'rounds', () => undefined)
      .test('parses', () => {
        throw new SyntaxError('bad input');
      });
  });
  return suite;
}

describe('formatDuration', () => {
  test.for([
    { durationMs: 0, expected: '0.000 ms' },
    { durationMs: 1.5, expected: '1.500 ms' },
    { durationMs: 12.3456, expected: '12.346 ms' }
  ])('$durationMs → $expected', ({ durationMs, expected }) => {
    expect(formatDuration(durationMs)).toBe(expected);
  });
});

describe('formatScenarioSummary', () => {
  test('lists failed and errored cases only by default', () => {
    const suite = createMathSuite();

    const summary = formatScenarioSummary(suite.runScenario('Math'));

    expect(summary.split('\n')).toStrictEqual([
      'SUMMARY [Math] [3.000 ms]:',
      '  PASSED: 1/4',
      '  FAILED: 1/4',
      '    [divides] [1.000 ms]',
      '    Message: Expected values to be equal',
      '      [REACHED] 3.5',
      '      [EXPECTED EQUAL TO] 3',
      '  SKIPPED: 1/4',
      '  ERRORS: 1/4',
      '    [parses] [1.000 ms]',
      '    Message: SyntaxError: bad input'
    ]);
  });

  test('verbose mode also lists passed and skipped cases', () => {
    const suite = createMathSuite();

    const summary = formatScenarioSummary(suite.runScenario('Math'), { verbose: true });

    expect(summary.split('\n')).toStrictEqual([
      'SUMMARY [Math] [3.000 ms]:',
      '  PASSED: 1/4',
      '    [adds] [1.000 ms]',
      '  FAILED: 1/4',
      '    [divides] [1.000 ms]',
      '    Message: Expected values to be equal',
      '      [REACHED] 3.5',
      '      [EXPECTED EQUAL TO] 3',
      '  SKIPPED: 1/4',
      '    [rounds] [0.000 ms]',
      '    Message: not ready',
      '  ERRORS: 1/4',
      '    [parses] [1.000 ms]',
      '    Message: SyntaxError: bad input'
    ]);
  });

  test('omits empty sections and names anonymous cases', () => {
    const suite = createTestSuite({ clock: createSteppingClock(), logger: silentLogger });
    suite.declareScenario('Anonymous').test(() => {
      assertThat(false).isTrue();
    });

    const summary = formatScenarioSummary(suite.runScenario('Anonymous'));

    expect(summary.split('\n')).toStrictEqual([
      'SUMMARY [Anonymous] [1.000 ms]:',
      '  FAILED: 1/1',
      '    [(anonymous)] [1.000 ms]',
      '    Message: Expected values to be equal',
      '      [REACHED] false',
      '      [EXPECTED EQUAL TO] true'
    ]);
  });

  test('counts are out of every registered case', () => {
    const suite = createTestSuite({ clock: createSteppingClock(), logger: silentLogger });
    const scenario = suite.declareScenario('Late').test('adds', () => undefined);

    suite.runScenario('Late');
    scenario.test('appended', () => undefined);

    expect(formatScenarioSummary(suite.report('Late'))).toBe(
      'SUMMARY [Late] [1.000 ms]:\n  PASSED: 1/2'
    );
  });

  test('a scenario that has not run prints a placeholder', () => {
    const suite = createMathSuite();

    expect(formatScenarioSummary(suite.report('Math'))).toBe(
      'SUMMARY [Math] [0.000 ms]:\n  NOT RUN YET'
    );
  });
});
