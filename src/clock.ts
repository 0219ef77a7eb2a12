import { performance } from 'node:perf_hooks';

/**
 * Monotonic time source in milliseconds. Only differences between two
 * readings are meaningful.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now()
};
