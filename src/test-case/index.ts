export {
  ASYNC_PROCEDURE_MESSAGE,
  createSkippedTestCase,
  createTestCase,
  hasRun,
  runTestCase
} from './test-case';
export type {
  RunnableTestCase,
  SkippedTestCase,
  TestCase,
  TestCaseView,
  TestProcedure
} from './test-case';
export { TestOutcome, formatOutcome, isTerminalOutcome } from './outcome';
export type { TerminalOutcome } from './outcome';
