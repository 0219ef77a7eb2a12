import { type Difference, formatPath } from '../differ';
import { OPAQUE_VALUE, describeError, formatValue, isDisplayable } from './display';
import { type SourceLocation, formatLocation } from './location';

/**
 * Classification of a failed assertion.
 *
 * - `equal`: the reached value was expected to equal the expected one.
 * - `different`: the reached value was expected to differ from the expected one.
 * - `exception`: a procedure was expected to raise a specific exception.
 * - `schema`: the reached value was expected to satisfy a schema.
 * - `explicit`: the test called `fail()`.
 */
export type FailureKind = 'equal' | 'different' | 'exception' | 'schema' | 'explicit';

/**
 * Outcome of invoking a procedure under `expectException`.
 */
export type ThrownResult =
  | { readonly threw: false }
  | { readonly threw: true; readonly error: unknown };

/**
 * A schema issue in display form: dotted path plus message.
 */
export type FailureIssue = {
  readonly path: string;
  readonly message: string;
};

/**
 * Optional information every assertion method accepts.
 */
export type AssertionContext = {
  /**
   * Replaces the default failure header.
   */
  message?: string;

  /**
   * Where the assertion was written; see `lineInfo` and `captureLocation`.
   */
  location?: SourceLocation;
};

type ComparisonFailure = {
  kind: 'equal' | 'different';
  reached: unknown;
  expected: unknown;
  /**
   * Structural differences, when both sides were containers.
   */
  differences?: readonly Difference[];
};

type ExceptionFailure = {
  kind: 'exception';
  expectedException: string;
  thrown: ThrownResult;
};

type SchemaFailure = {
  kind: 'schema';
  reached: unknown;
  issues: readonly FailureIssue[];
};

type ExplicitFailure = {
  kind: 'explicit';
};

/**
 * What a failed predicate reports, before the caller's context is added.
 */
export type FailureSignal =
  | ComparisonFailure
  | ExceptionFailure
  | SchemaFailure
  | ExplicitFailure;

/**
 * Everything needed to build a {@link TestFailure}.
 */
export type FailureDetails = FailureSignal & AssertionContext;

const DEFAULT_HEADERS: Record<FailureKind, string> = {
  equal: 'Expected values to be equal',
  different: 'Expected values to be different',
  exception: 'Expected an exception',
  schema: 'Expected value to match schema',
  explicit: 'Test failed'
};

/**
 * Maximum number of `[DIFF]` lines listed before the remainder is summarised.
 */
const MAX_PREVIEW_DIFFERENCES = 5;

/**
 * The structured failure signal raised by the assertion engine.
 *
 * A test case distinguishes failures from errors by this class alone: a
 * thrown `TestFailure` makes the case `failed`, anything else `errored`.
 */
export class TestFailure extends Error {
  override readonly name = 'TestFailure';

  readonly kind: FailureKind;
  readonly location: SourceLocation | undefined;
  readonly details: FailureDetails;

  constructor(details: FailureDetails) {
    super(details.message || DEFAULT_HEADERS[details.kind]);
    this.kind = details.kind;
    this.location = details.location;
    this.details = details;
  }

  /**
   * The text recorded as a failed case's message: the header with its
   * location tag, then one indented line per detail.
   */
  render(): string {
    const header = this.location
      ? `${this.message} (${formatLocation(this.location)})`
      : this.message;

    return [header, ...detailLines(this.details).map(line => `  ${line}`)].join('\n');
  }
}

function detailLines(details: FailureDetails): string[] {
  switch (details.kind) {
    case 'equal':
    case 'different':
      return comparisonLines(details);
    case 'exception':
      return [
        `[EXPECTED EXCEPTION] ${details.expectedException}`,
        details.thrown.threw
          ? `[REACHED] ${describeError(details.thrown.error)}`
          : '[REACHED] no exception'
      ];
    case 'schema': {
      const lines = isDisplayable(details.reached)
        ? [`[REACHED] ${formatValue(details.reached)}`]
        : [];
      return lines.concat(
        details.issues.map(issue => `[ISSUE] ${issue.path}: ${issue.message}`)
      );
    }
    case 'explicit':
      return [];
  }
}

function comparisonLines(details: ComparisonFailure): string[] {
  if (!isDisplayable(details.reached) || !isDisplayable(details.expected)) {
    return [details.kind === 'equal' ? 'values differ' : 'values do not differ'];
  }

  const lines = [
    `[REACHED] ${formatValue(details.reached)}`,
    details.kind === 'equal'
      ? `[EXPECTED EQUAL TO] ${formatValue(details.expected)}`
      : `[EXPECTED DIFFERENT FROM] ${formatValue(details.expected)}`
  ];

  const differences = details.differences ?? [];
  for (const difference of differences.slice(0, MAX_PREVIEW_DIFFERENCES)) {
    lines.push(`[DIFF] ${formatDifference(difference)}`);
  }
  if (differences.length > MAX_PREVIEW_DIFFERENCES) {
    lines.push(`[DIFF] … (${differences.length - MAX_PREVIEW_DIFFERENCES} more)`);
  }

  return lines;
}

function formatDifference(difference: Difference): string {
  const path = formatPath(difference.path);
  switch (difference.type) {
    case 'CHANGE':
      return `${path}: expected ${formatOperand(difference.expected)}, reached ${formatOperand(difference.reached)}`;
    case 'CREATE':
      return `${path}: unexpected ${formatOperand(difference.reached)}`;
    case 'REMOVE':
      return `${path}: missing ${formatOperand(difference.expected)}`;
  }
}

function formatOperand(value: unknown): string {
  return isDisplayable(value) ? formatValue(value) : OPAQUE_VALUE;
}

/**
 * Type guard for the failure signal, usable on any caught value.
 */
export function isTestFailure(value: unknown): value is TestFailure {
  return value instanceof TestFailure;
}
