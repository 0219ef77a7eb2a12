import {
  type ResolvedSuiteOptions,
  type SuiteOptions,
  normalizeOptions
} from '../config';
import type { ScenarioKey, ScenarioRegistry } from '../registry';
import {
  type ScenarioObserver,
  ScenarioRunner,
  type ScenarioState
} from '../runner';
import type { TestCaseView } from '../test-case';
import { ScenarioBuilder } from './scenario-builder';

/**
 * One reported case: the (label, duration, message) tuple of the query surface.
 */
export type TestCaseSummary = {
  label: string;
  durationMs: number;
  message: string | undefined;
};

export type OutcomeBucket = {
  count: number;
  cases: readonly TestCaseSummary[];
};

/**
 * Read-only results of one scenario, as consumed by reporting.
 *
 * All counts are zero and all buckets empty until the scenario has run.
 */
export type ScenarioReport = {
  name: ScenarioKey;
  state: ScenarioState;
  durationMs: number;
  /**
   * Cases that ran: `passed + failed + errored + skipped`.
   */
  totalCount: number;
  /**
   * Cases currently registered, whether or not they ran.
   */
  registeredCount: number;
  passed: OutcomeBucket;
  failed: OutcomeBucket;
  errored: OutcomeBucket;
  skipped: OutcomeBucket;
};

export type ScenarioBody = (scenario: ScenarioBuilder) => void;

function summarize(testCases: readonly TestCaseView[]): OutcomeBucket {
  return {
    count: testCases.length,
    cases: testCases.map(({ label, durationMs, message }) => ({
      label,
      durationMs,
      message
    }))
  };
}

/**
 * Registration, execution, query and observer surfaces over one registry.
 *
 * Scenarios may be declared anywhere before they run; declaring the same
 * name again appends to it.
 */
export class TestSuite {
  private readonly options: ResolvedSuiteOptions;
  private readonly runners = new Map<ScenarioKey, ScenarioRunner>();

  constructor(options: SuiteOptions = {}) {
    this.options = normalizeOptions(options);
  }

  get registry(): ScenarioRegistry {
    return this.options.registry;
  }

  /**
   * Registers a scenario (if new) and lets `body` append test cases to it.
   */
  declareScenario(name: ScenarioKey, body?: ScenarioBody): ScenarioBuilder {
    this.registry.register(name);
    const runner = this.runner(name);

    const builder = new ScenarioBuilder(name, this.registry, () => {
      if (runner.state === 'completed') {
        this.options.logger.warn(
          { scenario: name },
          'Appending to a scenario that already ran; the case will not run'
        );
      }
    });

    body?.(builder);
    return builder;
  }

  /**
   * Runs a scenario and returns its report. A name that was never declared
   * runs zero cases.
   */
  runScenario(name: ScenarioKey): ScenarioReport {
    this.runner(name).run();
    return this.report(name);
  }

  /**
   * Runs every declared scenario in declaration order.
   */
  runAll(): ScenarioReport[] {
    return this.scenarios().map(name => this.runScenario(name));
  }

  report(name: ScenarioKey): ScenarioReport {
    const result = this.runner(name).result();
    const passed = summarize(result.passed);
    const failed = summarize(result.failed);
    const errored = summarize(result.errored);
    const skipped = summarize(result.skipped);

    return {
      name,
      state: result.state,
      durationMs: result.totalDurationMs,
      totalCount: passed.count + failed.count + errored.count + skipped.count,
      registeredCount: this.registry.lookup(name).length,
      passed,
      failed,
      errored,
      skipped
    };
  }

  attachObserver(name: ScenarioKey, observer: ScenarioObserver): void {
    this.runner(name).attach(observer);
  }

  detachObserver(name: ScenarioKey, observer: ScenarioObserver): boolean {
    return this.runner(name).detach(observer);
  }

  /**
   * Declared scenario names, in declaration order.
   */
  scenarios(): ScenarioKey[] {
    return this.registry.keys();
  }

  private runner(name: ScenarioKey): ScenarioRunner {
    let runner = this.runners.get(name);
    if (!runner) {
      runner = new ScenarioRunner(name, this.registry, {
        clock: this.options.clock,
        logger: this.options.logger
      });
      this.runners.set(name, runner);
    }
    return runner;
  }
}

/**
 * Creates a suite. Construct it once at the entry point and pass it to the
 * modules that declare scenarios.
 */
export function createTestSuite(options?: SuiteOptions): TestSuite {
  return new TestSuite(options);
}
