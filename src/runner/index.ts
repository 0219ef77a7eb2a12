export { ScenarioRunner } from './scenario-runner';
export type {
  RunnerOptions,
  ScenarioRunResult,
  ScenarioState
} from './scenario-runner';
export { ObserverChannel } from './observer-channel';
export type { ScenarioObserver } from './observer-channel';
