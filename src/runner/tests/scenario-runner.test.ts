import { describe, expect, test, vi } from 'vitest';

import { createLogCapture, createSteppingClock, silentLogger } from '../../tests/helpers';
import { assertThat } from '../../assertion';
import { ScenarioRegistry } from '../../registry';
import {
  type TestCaseView,
  createSkippedTestCase,
  createTestCase,
  runTestCase
} from '../../test-case';
import { ScenarioRunner, type ScenarioObserver } from '..';

function createMathRegistry(): ScenarioRegistry {
  const registry = new ScenarioRegistry();
  registry.append('Math', createTestCase('adds', () => {
    assertThat(1 + 1).isEqualTo(2);
  }));
  registry.append('Math', createTestCase('divides', () => {
    assertThat(7 / 2).isEqualTo(3);
  }));
  registry.append('Math', createSkippedTestCase('rounds', () => undefined, 'not ready'));
  registry.append('Math', createTestCase('parses', () => {
    throw new SyntaxError('bad input');
  }));
  registry.append('Math', createTestCase('multiplies', () => {
    assertThat(2 * 3).isEqualTo(6);
  }));
  return registry;
}

class Unprintable {
  toString(): string {
    throw new TypeError('no text form');
  }
}

function labels(testCases: readonly TestCaseView[]): string[] {
  return testCases.map(testCase => testCase.label);
}

describe('ScenarioRunner', () => {
  test('reports nothing before the first run', () => {
    const runner = new ScenarioRunner('Math', createMathRegistry(), {
      clock: createSteppingClock(),
      logger: silentLogger
    });

    expect(runner.state).toBe('pending');
    expect(runner.totalCount).toBe(0);
    expect(runner.passedCount).toBe(0);
    expect(runner.failed).toStrictEqual([]);
    expect(runner.totalDurationMs).toBe(0);
  });

  test('partitions the cases by outcome in execution order', () => {
    const runner = new ScenarioRunner('Math', createMathRegistry(), {
      clock: createSteppingClock(),
      logger: silentLogger
    });

    runner.run();

    expect(runner.state).toBe('completed');
    expect(labels(runner.passed)).toStrictEqual(['adds', 'multiplies']);
    expect(labels(runner.failed)).toStrictEqual(['divides']);
    expect(labels(runner.errored)).toStrictEqual(['parses']);
    expect(labels(runner.skipped)).toStrictEqual(['rounds']);
    expect(runner.totalCount).toBe(5);
  });

  test('sums the durations of the cases that executed', () => {
    const runner = new ScenarioRunner('Math', createMathRegistry(), {
      clock: createSteppingClock(3),
      logger: silentLogger
    });

    runner.run();

    // four executed cases of 3 ms each; the skipped one takes no time
    expect(runner.totalDurationMs).toBe(12);
  });

  test('an unknown scenario completes with zero cases', () => {
    const runner = new ScenarioRunner('Unknown', new ScenarioRegistry(), {
      clock: createSteppingClock(),
      logger: silentLogger
    });

    runner.run();

    expect(runner.state).toBe('completed');
    expect(runner.totalCount).toBe(0);
  });

  test('a repeated run is a logged no-op', () => {
    let calls = 0;
    const registry = new ScenarioRegistry();
    registry.append('Counter', createTestCase('counts', () => {
      calls += 1;
    }));
    const capture = createLogCapture('warn');
    const runner = new ScenarioRunner('Counter', registry, {
      clock: createSteppingClock(),
      logger: capture.logger
    });

    runner.run();
    runner.run();

    expect(calls).toBe(1);
    expect(runner.passedCount).toBe(1);
    expect(capture.records()).toMatchObject([
      { level: 'warn', scenario: 'Counter', msg: 'Scenario already ran; ignoring repeated run' }
    ]);
  });

  test('notifies each observer once per case, skipped ones included', () => {
    const runner = new ScenarioRunner('Math', createMathRegistry(), {
      clock: createSteppingClock(),
      logger: silentLogger
    });
    const seen: string[] = [];
    const observer: ScenarioObserver = {
      update: testCase => seen.push(`${testCase.label}:${testCase.outcome}`)
    };

    runner.attach(observer);
    runner.attach(observer);
    runner.run();

    expect(seen).toStrictEqual([
      'adds:passed',
      'divides:failed',
      'rounds:skipped',
      'parses:errored',
      'multiplies:passed'
    ]);
  });

  test('a detached observer is not notified', () => {
    const runner = new ScenarioRunner('Math', createMathRegistry(), {
      clock: createSteppingClock(),
      logger: silentLogger
    });
    const observer = { update: vi.fn<ScenarioObserver['update']>() };

    runner.attach(observer);
    expect(runner.detach(observer)).toBe(true);
    runner.run();

    expect(observer.update).not.toHaveBeenCalled();
  });

  test('a throwing observer is logged and the run continues', () => {
    const capture = createLogCapture('warn');
    const runner = new ScenarioRunner('Math', createMathRegistry(), {
      clock: createSteppingClock(),
      logger: capture.logger
    });

    runner.attach({
      update(testCase) {
        if (testCase.label === 'adds') throw new Error('observer broke');
      }
    });
    runner.run();

    expect(runner.totalCount).toBe(5);
    expect(capture.records()).toMatchObject([
      {
        level: 'error',
        scenario: 'Math',
        label: 'adds',
        msg: 'Observer failed',
        err: { message: 'observer broke' }
      }
    ]);
  });

  test('cases appended after the run are not executed', () => {
    const registry = createMathRegistry();
    const runner = new ScenarioRunner('Math', registry, {
      clock: createSteppingClock(),
      logger: silentLogger
    });

    runner.run();
    registry.append('Math', createTestCase('late', () => undefined));
    runner.run();

    expect(runner.totalCount).toBe(5);
    expect(registry.lookup('Math')).toHaveLength(6);
  });

  test('a failure on unprintable values does not stop the run', () => {
    const registry = new ScenarioRegistry();
    let ranSecond = false;
    registry.append('Unprintable', createTestCase('compares', () => {
      assertThat(new Unprintable()).isSameAs(new Unprintable());
    }));
    registry.append('Unprintable', createTestCase('follows', () => {
      ranSecond = true;
    }));
    const runner = new ScenarioRunner('Unprintable', registry, {
      clock: createSteppingClock(),
      logger: silentLogger
    });

    runner.run();

    expect(runner.state).toBe('completed');
    expect(ranSecond).toBe(true);
    expect(labels(runner.failed)).toStrictEqual(['compares']);
    expect(labels(runner.passed)).toStrictEqual(['follows']);
  });

  test('a case that already ran is reported from its recorded outcome', () => {
    let calls = 0;
    const registry = new ScenarioRegistry();
    const counted = createTestCase('counts', () => {
      calls += 1;
    });
    registry.append('Counter', counted);
    runTestCase(counted, createSteppingClock(4));

    const runner = new ScenarioRunner('Counter', registry, {
      clock: createSteppingClock(),
      logger: silentLogger
    });
    const seen: string[] = [];
    runner.attach({ update: testCase => seen.push(testCase.label) });
    runner.run();

    expect(calls).toBe(1);
    expect(labels(runner.passed)).toStrictEqual(['counts']);
    expect(runner.totalCount).toBe(1);
    expect(runner.totalDurationMs).toBe(4);
    expect(seen).toStrictEqual(['counts']);
  });

  test('result() is a snapshot', () => {
    const runner = new ScenarioRunner('Math', createMathRegistry(), {
      clock: createSteppingClock(),
      logger: silentLogger
    });

    const before = runner.result();
    runner.run();

    expect(before.state).toBe('pending');
    expect(before.passed).toStrictEqual([]);
    expect(runner.result().passed).toHaveLength(2);
  });
});
