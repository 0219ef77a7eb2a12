import type { TestCaseView } from '../test-case';

/**
 * Subscriber notified once per finished test case, skipped ones included.
 *
 * The view must be treated as read-only. The same observer instance may be
 * attached to several scenarios.
 */
export interface ScenarioObserver {
  update(testCase: TestCaseView): void;
}

/**
 * De-duplicating set of observers, keyed by instance identity.
 */
export class ObserverChannel {
  private readonly observers = new Set<ScenarioObserver>();

  /**
   * Adds an observer; attaching the same instance twice has no effect.
   */
  attach(observer: ScenarioObserver): void {
    this.observers.add(observer);
  }

  /**
   * Removes an observer.
   *
   * @returns `true` if the observer was attached.
   */
  detach(observer: ScenarioObserver): boolean {
    return this.observers.delete(observer);
  }

  get size(): number {
    return this.observers.size;
  }

  /**
   * Calls `update` on every attached observer. Order across observers is
   * unspecified.
   *
   * @param onError - Receives an observer's exception; the remaining
   *   observers are still notified. Without it the exception propagates.
   */
  notify(
    testCase: TestCaseView,
    onError?: (error: unknown, observer: ScenarioObserver) => void
  ): void {
    for (const observer of [...this.observers]) {
      if (!onError) {
        observer.update(testCase);
        continue;
      }
      try {
        observer.update(testCase);
      } catch (error) {
        onError(error, observer);
      }
    }
  }
}
