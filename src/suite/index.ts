export { ScenarioBuilder } from './scenario-builder';
export { TestSuite, createTestSuite } from './test-suite';
export type {
  OutcomeBucket,
  ScenarioBody,
  ScenarioReport,
  TestCaseSummary
} from './test-suite';
