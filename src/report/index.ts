export { formatDuration, formatScenarioSummary } from './summary';
export type { SummaryOptions } from './summary';
export { createLoggingObserver } from './logging-observer';
