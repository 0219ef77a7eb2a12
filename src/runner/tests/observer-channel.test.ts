import { describe, expect, test, vi } from 'vitest';

import { createTestCase } from '../../test-case';
import { ObserverChannel, type ScenarioObserver } from '..';

function createObserver() {
  return { update: vi.fn<ScenarioObserver['update']>() };
}

describe('ObserverChannel', () => {
  const testCase = createTestCase('adds', () => undefined);

  test('attaching the same observer twice notifies it once', () => {
    const channel = new ObserverChannel();
    const observer = createObserver();

    channel.attach(observer);
    channel.attach(observer);
    channel.notify(testCase);

    expect(channel.size).toBe(1);
    expect(observer.update).toHaveBeenCalledTimes(1);
    expect(observer.update).toHaveBeenCalledWith(testCase);
  });

  test('detach reports whether the observer was attached', () => {
    const channel = new ObserverChannel();
    const observer = createObserver();

    channel.attach(observer);

    expect(channel.detach(observer)).toBe(true);
    expect(channel.detach(observer)).toBe(false);

    channel.notify(testCase);
    expect(observer.update).not.toHaveBeenCalled();
  });

  test('without an error handler an observer exception propagates', () => {
    const channel = new ObserverChannel();
    channel.attach({
      update() {
        throw new Error('observer broke');
      }
    });

    expect(() => channel.notify(testCase)).toThrow('observer broke');
  });

  test('with an error handler the remaining observers are still notified', () => {
    const channel = new ObserverChannel();
    const failing: ScenarioObserver = {
      update() {
        throw new Error('observer broke');
      }
    };
    const healthy = createObserver();
    const onError = vi.fn();

    channel.attach(failing);
    channel.attach(healthy);
    channel.notify(testCase, onError);

    expect(healthy.update).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(new Error('observer broke'), failing);
  });

  test('an observer detached during notification still sees the current case', () => {
    const channel = new ObserverChannel();
    const late = createObserver();
    const detacher: ScenarioObserver = {
      update() {
        channel.detach(late);
      }
    };

    channel.attach(detacher);
    channel.attach(late);
    channel.notify(testCase);
    channel.notify(testCase);

    expect(late.update).toHaveBeenCalledTimes(1);
  });
});
