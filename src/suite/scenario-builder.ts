import type { ScenarioKey, ScenarioRegistry } from '../registry';
import {
  type SkippedTestCase,
  type TestProcedure,
  createSkippedTestCase,
  createTestCase
} from '../test-case';

/**
 * Registration surface handed to a scenario body.
 *
 * ```ts
 * suite.declareScenario('Math', scenario => {
 *   scenario.test('adds', () => assertThat(2 + 2).isEqualTo(4));
 *   scenario.skip('flaky on CI', 'divides', () => { ... });
 * });
 * ```
 */
export class ScenarioBuilder {
  constructor(
    readonly key: ScenarioKey,
    private readonly registry: ScenarioRegistry,
    private readonly onAppend: () => void = () => undefined
  ) {}

  /**
   * Appends an anonymous or labelled test case.
   */
  test(procedure: TestProcedure): this;
  test(label: string, procedure: TestProcedure): this;
  test(labelOrProcedure: string | TestProcedure, procedure?: TestProcedure): this {
    const [label, body] = resolveArguments(labelOrProcedure, procedure);
    this.onAppend();
    this.registry.append(this.key, createTestCase(label, body));
    return this;
  }

  /**
   * Appends a case that is reported as skipped and never executed.
   */
  skip(procedure: TestProcedure): this;
  skip(label: string, procedure: TestProcedure): this;
  skip(reason: string, label: string, procedure: TestProcedure): this;
  skip(
    first: string | TestProcedure,
    second?: string | TestProcedure,
    third?: TestProcedure
  ): this {
    let testCase: SkippedTestCase;
    if (typeof first === 'function') {
      testCase = createSkippedTestCase('', first);
    } else if (typeof second === 'function') {
      testCase = createSkippedTestCase(first, second);
    } else if (second !== undefined && third !== undefined) {
      testCase = createSkippedTestCase(second, third, first);
    } else {
      throw new TypeError('skip() requires a test procedure.');
    }

    this.onAppend();
    this.registry.append(this.key, testCase);
    return this;
  }
}

function resolveArguments(
  labelOrProcedure: string | TestProcedure,
  procedure: TestProcedure | undefined
): [string, TestProcedure] {
  if (typeof labelOrProcedure === 'function') return ['', labelOrProcedure];
  if (!procedure) throw new TypeError('test() requires a test procedure.');
  return [labelOrProcedure, procedure];
}
