export {
  AssertionChain,
  NumberAssertion,
  ProcedureAssertion,
  StringAssertion,
  ValueAssertion,
  assertThat
} from './asserter';
export type {
  CaseOptions,
  ExceptionClass,
  Procedure,
  ToleranceOptions
} from './asserter';
export { TestFailure, isTestFailure } from './failure';
export type {
  AssertionContext,
  FailureDetails,
  FailureIssue,
  FailureKind,
  FailureSignal,
  ThrownResult
} from './failure';
export { checkEquality, isEquatable } from './equality';
export type { Equatable, EqualityResult } from './equality';
export {
  OPAQUE_VALUE,
  UNKNOWN_ERROR,
  describeError,
  formatValue,
  isDisplayable
} from './display';
export { captureLocation, formatLocation, lineInfo } from './location';
export type { SourceLocation } from './location';
