import type { Clock } from '../clock';
import type { Logger } from '../logger';
import type { ScenarioKey, ScenarioRegistry } from '../registry';
import {
  type TerminalOutcome,
  type TestCaseView,
  hasRun,
  isTerminalOutcome,
  runTestCase
} from '../test-case';
import { ObserverChannel, type ScenarioObserver } from './observer-channel';

/**
 * `pending` until `run()` has iterated every case, then `completed`.
 */
export type ScenarioState = 'pending' | 'completed';

export type RunnerOptions = {
  clock: Clock;
  logger: Logger;
};

/**
 * Snapshot of a scenario's aggregates. The four buckets partition the cases
 * that ran, in execution order.
 */
export type ScenarioRunResult = {
  key: ScenarioKey;
  state: ScenarioState;
  totalDurationMs: number;
  passed: readonly TestCaseView[];
  failed: readonly TestCaseView[];
  errored: readonly TestCaseView[];
  skipped: readonly TestCaseView[];
};

type Buckets = Record<TerminalOutcome, TestCaseView[]>;

function createBuckets(): Buckets {
  return { passed: [], failed: [], errored: [], skipped: [] };
}

/**
 * Executes every test case of one scenario in declaration order and
 * aggregates the outcomes.
 *
 * Before the first run completes, every count is zero and every list empty,
 * regardless of how many cases are registered. The runner never raises:
 * procedure failures are classified by the case, and an observer that
 * throws is logged.
 */
export class ScenarioRunner {
  private currentState: ScenarioState = 'pending';
  private totalDuration = 0;
  private readonly buckets: Buckets = createBuckets();
  private readonly channel = new ObserverChannel();
  private readonly logger: Logger;

  constructor(
    readonly key: ScenarioKey,
    private readonly registry: ScenarioRegistry,
    private readonly options: RunnerOptions
  ) {
    this.logger = options.logger.child({ scenario: key });
  }

  get state(): ScenarioState {
    return this.currentState;
  }

  attach(observer: ScenarioObserver): void {
    this.channel.attach(observer);
  }

  detach(observer: ScenarioObserver): boolean {
    return this.channel.detach(observer);
  }

  /**
   * Runs the scenario once. Calling it again after completion is a no-op.
   *
   * For each case, in order:
   * 1. run it inside its failure boundary; a case that already ran through
   *    another suite on the same registry keeps its recorded outcome,
   * 2. add its duration to the scenario total,
   * 3. notify the observers,
   * 4. file it into the bucket matching its outcome.
   */
  run(): void {
    if (this.currentState === 'completed') {
      this.logger.warn('Scenario already ran; ignoring repeated run');
      return;
    }

    const testCases = [...this.registry.lookup(this.key)];
    this.logger.debug({ count: testCases.length }, 'Running scenario');

    for (const testCase of testCases) {
      if (hasRun(testCase)) {
        this.logger.debug(
          { label: testCase.label },
          'Test case already ran; reporting its recorded outcome'
        );
      } else {
        runTestCase(testCase, this.options.clock);
      }
      this.totalDuration += testCase.durationMs;

      this.channel.notify(testCase, error =>
        this.logger.error({ err: error, label: testCase.label }, 'Observer failed')
      );

      if (isTerminalOutcome(testCase.outcome)) {
        this.buckets[testCase.outcome].push(testCase);
      } else {
        this.logger.error({ label: testCase.label }, 'Test case left without an outcome');
      }
    }

    this.currentState = 'completed';
    this.logger.info(
      {
        passed: this.passedCount,
        failed: this.failedCount,
        errored: this.erroredCount,
        skipped: this.skippedCount,
        durationMs: this.totalDuration
      },
      'Scenario completed'
    );
  }

  private get completed(): boolean {
    return this.currentState === 'completed';
  }

  private bucket(outcome: TerminalOutcome): readonly TestCaseView[] {
    return this.completed ? [...this.buckets[outcome]] : [];
  }

  private count(outcome: TerminalOutcome): number {
    return this.completed ? this.buckets[outcome].length : 0;
  }

  get passed(): readonly TestCaseView[] {
    return this.bucket('passed');
  }

  get failed(): readonly TestCaseView[] {
    return this.bucket('failed');
  }

  get errored(): readonly TestCaseView[] {
    return this.bucket('errored');
  }

  get skipped(): readonly TestCaseView[] {
    return this.bucket('skipped');
  }

  get passedCount(): number {
    return this.count('passed');
  }

  get failedCount(): number {
    return this.count('failed');
  }

  get erroredCount(): number {
    return this.count('errored');
  }

  get skippedCount(): number {
    return this.count('skipped');
  }

  /**
   * Number of cases that ran: the sum of the four buckets.
   */
  get totalCount(): number {
    return this.passedCount + this.failedCount + this.erroredCount + this.skippedCount;
  }

  get totalDurationMs(): number {
    return this.completed ? this.totalDuration : 0;
  }

  result(): ScenarioRunResult {
    return {
      key: this.key,
      state: this.currentState,
      totalDurationMs: this.totalDurationMs,
      passed: this.passed,
      failed: this.failed,
      errored: this.errored,
      skipped: this.skipped
    };
  }
}
