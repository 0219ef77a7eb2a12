import type { TestCase } from '../test-case';

/**
 * Identifies a scenario. Chosen by the programmer; stable for the lifetime
 * of the registry.
 */
export type ScenarioKey = string;

const EMPTY: readonly TestCase[] = Object.freeze([]);

/**
 * Append-only store mapping each scenario to its ordered test cases.
 *
 * Insertion order within a scenario is the execution order. Entries are
 * created lazily on first registration and never removed.
 */
export class ScenarioRegistry {
  private readonly scenarios = new Map<ScenarioKey, TestCase[]>();

  /**
   * Returns the ordered sequence for `key`, creating an empty one if absent.
   */
  register(key: ScenarioKey): readonly TestCase[] {
    return this.entry(key);
  }

  /**
   * Takes ownership of `testCase` and appends it to the scenario.
   */
  append(key: ScenarioKey, testCase: TestCase): void {
    this.entry(key).push(testCase);
  }

  /**
   * Returns the sequence for `key` without creating it. A key that was never
   * registered yields an empty sequence.
   */
  lookup(key: ScenarioKey): readonly TestCase[] {
    return this.scenarios.get(key) ?? EMPTY;
  }

  has(key: ScenarioKey): boolean {
    return this.scenarios.has(key);
  }

  /**
   * Registered scenario keys, in registration order.
   */
  keys(): ScenarioKey[] {
    return [...this.scenarios.keys()];
  }

  private entry(key: ScenarioKey): TestCase[] {
    let testCases = this.scenarios.get(key);
    if (!testCases) {
      testCases = [];
      this.scenarios.set(key, testCases);
    }
    return testCases;
  }
}
