export { ScenarioRegistry } from './scenario-registry';
export type { ScenarioKey } from './scenario-registry';
