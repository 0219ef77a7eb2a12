import {
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
  pino
} from 'pino';

export type { Logger };

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const satisfies readonly LogLevel[];

/**
 * Environment variable consulted when no log level is passed explicitly.
 */
export const LOG_LEVEL_ENV = 'SCENARIO_RUNNER_LOG_LEVEL';

/**
 * Creates the structured JSON logger used by suites and runners.
 *
 * @param level - Minimum level written.
 * @param destination - Where lines go; stdout when omitted.
 */
export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  const options = {
    name: 'scenario-runner',
    level,
    formatters: {
      level: (label: string) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  return destination ? pino(options, destination) : pino(options);
}
