import type { Clock } from '../clock';
import { type Logger, createLogger } from '../logger';
import type { ScenarioInput } from './types';

/**
 * Resolves a scenario input that may be a direct value or a builder function.
 */
export function resolveScenarioInput<T>(input: ScenarioInput<T>): T {
  return isBuilder(input) ? input() : input;
}

function isBuilder<T>(input: ScenarioInput<T>): input is () => T {
  return typeof input === 'function';
}

/**
 * Deterministic clock advancing by `step` milliseconds on every reading.
 *
 * A procedure timed between two consecutive readings lasts exactly `step`.
 */
export function createSteppingClock(step = 1): Clock & { readings: number } {
  let readings = 0;
  return {
    now: () => readings++ * step,
    get readings() {
      return readings;
    }
  };
}

export type LogRecord = {
  level: string;
  msg: string;
  [field: string]: unknown;
};

function isLogRecord(value: unknown): value is LogRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'level' in value &&
    typeof value.level === 'string' &&
    'msg' in value &&
    typeof value.msg === 'string'
  );
}

/**
 * A pino logger writing into memory, for asserting on emitted lines.
 */
export function createLogCapture(level: 'info' | 'debug' | 'warn' = 'debug'): {
  logger: Logger;
  records: () => LogRecord[];
} {
  const lines: string[] = [];
  const logger = createLogger(level, {
    write: (line: string) => {
      lines.push(line);
    }
  });

  return {
    logger,
    records: () =>
      lines
        .map((line): unknown => JSON.parse(line))
        .filter(isLogRecord)
  };
}

export const silentLogger: Logger = createLogger('silent');
