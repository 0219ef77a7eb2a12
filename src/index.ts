export * from './assertion';
export * from './test-case';
export * from './registry';
export * from './runner';
export * from './suite';
export * from './report';

export { diff, formatPath } from './differ';
export type { Difference, PathSegment } from './differ';
export { systemClock } from './clock';
export type { Clock } from './clock';
export { normalizeOptions, resolveLogLevel } from './config';
export type { ResolvedSuiteOptions, SuiteOptions } from './config';
export { LOG_LEVEL_ENV, createLogger } from './logger';
export type { LogLevel, Logger } from './logger';
export { ConfigurationError, InvalidToleranceError } from './errors';
