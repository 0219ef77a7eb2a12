import { z } from 'zod';

import { type Clock, systemClock } from './clock';
import { ConfigurationError } from './errors';
import {
  LOG_LEVELS,
  LOG_LEVEL_ENV,
  type LogLevel,
  type Logger,
  createLogger
} from './logger';
import { ScenarioRegistry } from './registry';

export type SuiteOptions = {
  /**
   * The registry scenarios are declared into. Pass one explicitly to share
   * it between suites; otherwise each suite owns a fresh registry.
   */
  registry?: ScenarioRegistry;

  /**
   * Time source for case durations.
   *
   * @default performance.now()
   */
  clock?: Clock;

  /**
   * Logger for run lifecycle events. Takes precedence over `logLevel`.
   */
  logger?: Logger;

  /**
   * Level of the logger created when `logger` is omitted.
   *
   * @default process.env.SCENARIO_RUNNER_LOG_LEVEL, then 'warn'
   */
  logLevel?: string;
};

export type ResolvedSuiteOptions = {
  registry: ScenarioRegistry;
  clock: Clock;
  logger: Logger;
};

const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Resolves the log level from an explicit value, then the environment, then
 * the default `'warn'`.
 *
 * @throws {ConfigurationError} If the resolved value is not a pino level.
 */
export function resolveLogLevel(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  const raw = explicit ?? env[LOG_LEVEL_ENV] ?? 'warn';
  const parsed = LogLevelSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid log level "${raw}". Expected one of: ${LOG_LEVELS.join(', ')}.`
    );
  }
  return parsed.data;
}

/**
 * Merges the provided partial options with the library defaults.
 *
 * Default settings:
 * - `registry`: a new, empty `ScenarioRegistry`.
 * - `clock`: `performance.now()`.
 * - `logger`: a pino logger at the resolved log level.
 */
export function normalizeOptions(options: SuiteOptions = {}): ResolvedSuiteOptions {
  return {
    registry: options.registry ?? new ScenarioRegistry(),
    clock: options.clock ?? systemClock,
    logger: options.logger ?? createLogger(resolveLogLevel(options.logLevel))
  };
}
