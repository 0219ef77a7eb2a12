import type { StandardSchemaV1 } from '@standard-schema/spec';

import {
  checkEquality,
  equalsIgnoringCase,
  isWithinTolerance
} from './equality';
import {
  type AssertionContext,
  type FailureSignal,
  type ThrownResult,
  TestFailure
} from './failure';
import { checkSchema } from './schema';
import {
  isFunction,
  isNullish,
  isNumber,
  isPromiseLike,
  isString
} from '../utils/type-guards';

/**
 * A zero-argument procedure whose raised exception an assertion inspects.
 */
export type Procedure = () => unknown;

/**
 * Any class whose instances may be thrown. `instanceof` decides the match,
 * so subclasses of the expected class also satisfy `expectException`.
 */
export type ExceptionClass<E = unknown> = abstract new (...args: never[]) => E;

/**
 * Equality options for numbers: accept `|reached - expected| <= tolerance`.
 */
export type ToleranceOptions = AssertionContext & {
  tolerance?: number;
};

/**
 * Equality options for text: compare after folding both sides to lower case.
 */
export type CaseOptions = AssertionContext & {
  ignoreCase?: boolean;
};

/**
 * The neutral "nothing asserted yet" state returned by every check.
 *
 * `andThat` declares the next expression to assert on. Checks in a chain are
 * independent: the first failing one raises and the rest never run.
 */
export class AssertionChain {
  andThat(value: number): NumberAssertion;
  andThat(value: string): StringAssertion;
  andThat(value: Procedure): ProcedureAssertion;
  andThat<T>(value: T): ValueAssertion<T>;
  andThat(value: unknown): ValueAssertion<unknown> {
    return assertThat(value);
  }
}

/**
 * Assertions available for any captured value.
 *
 * @template T - The captured value's type; expected values must share it.
 */
export class ValueAssertion<T> extends AssertionChain {
  constructor(protected readonly value: T) {
    super();
  }

  isTrue(context?: AssertionContext): AssertionChain {
    return this.check(
      this.value === true,
      { kind: 'equal', reached: this.value, expected: true },
      context
    );
  }

  isFalse(context?: AssertionContext): AssertionChain {
    return this.check(
      this.value === false,
      { kind: 'equal', reached: this.value, expected: false },
      context
    );
  }

  /**
   * Exact equality: `Equatable` values decide via `equals`, plain objects
   * and arrays compare structurally, other values with `===` (Date, RegExp
   * and boxed primitives by content).
   */
  isEqualTo(expected: T, context?: AssertionContext): AssertionChain {
    const { equal, differences } = checkEquality(this.value, expected);
    return this.check(
      equal,
      { kind: 'equal', reached: this.value, expected, differences },
      context
    );
  }

  isNotEqualTo(notExpected: T, context?: AssertionContext): AssertionChain {
    const { equal } = checkEquality(this.value, notExpected);
    return this.check(
      !equal,
      { kind: 'different', reached: this.value, expected: notExpected },
      context
    );
  }

  /**
   * Identity: both sides are the same instance (`Object.is`).
   */
  isSameAs(other: T, context?: AssertionContext): AssertionChain {
    return this.check(
      Object.is(this.value, other),
      { kind: 'equal', reached: this.value, expected: other },
      context
    );
  }

  isNotSameAs(other: T, context?: AssertionContext): AssertionChain {
    return this.check(
      !Object.is(this.value, other),
      { kind: 'different', reached: this.value, expected: other },
      context
    );
  }

  /**
   * Passes for `null` and `undefined`.
   */
  isNull(context?: AssertionContext): AssertionChain {
    return this.check(
      isNullish(this.value),
      { kind: 'equal', reached: this.value, expected: null },
      context
    );
  }

  isNotNull(context?: AssertionContext): AssertionChain {
    return this.check(
      !isNullish(this.value),
      { kind: 'different', reached: this.value, expected: null },
      context
    );
  }

  /**
   * Validates the captured value with a synchronous Standard Schema.
   */
  matchesSchema(schema: StandardSchemaV1, context?: AssertionContext): AssertionChain {
    const result = checkSchema(schema, this.value);
    if (result.valid) return new AssertionChain();
    return this.check(
      false,
      { kind: 'schema', reached: this.value, issues: result.issues },
      context
    );
  }

  /**
   * Unconditionally fails the enclosing test case.
   */
  fail(context: AssertionContext | string = {}): AssertionChain {
    const resolved = typeof context === 'string' ? { message: context } : context;
    return this.check(false, { kind: 'explicit' }, resolved);
  }

  /**
   * Raises a {@link TestFailure} when `condition` is false.
   */
  protected check(
    condition: boolean,
    signal: FailureSignal,
    context: AssertionContext = {}
  ): AssertionChain {
    if (!condition) {
      throw new TestFailure({ ...signal, ...context });
    }
    return new AssertionChain();
  }
}

export class NumberAssertion extends ValueAssertion<number> {
  /**
   * With `tolerance`, passes when `|reached - expected| <= tolerance`.
   *
   * @throws {InvalidToleranceError} If `tolerance` is negative or NaN.
   */
  override isEqualTo(expected: number, options: ToleranceOptions = {}): AssertionChain {
    const { tolerance, ...context } = options;
    if (tolerance === undefined) return super.isEqualTo(expected, context);

    return this.check(
      isWithinTolerance(this.value, expected, tolerance),
      { kind: 'equal', reached: this.value, expected },
      context
    );
  }

  /**
   * With `tolerance`, passes when `|reached - notExpected| > tolerance`.
   *
   * @throws {InvalidToleranceError} If `tolerance` is negative or NaN.
   */
  override isNotEqualTo(
    notExpected: number,
    options: ToleranceOptions = {}
  ): AssertionChain {
    const { tolerance, ...context } = options;
    if (tolerance === undefined) return super.isNotEqualTo(notExpected, context);

    return this.check(
      !isWithinTolerance(this.value, notExpected, tolerance),
      { kind: 'different', reached: this.value, expected: notExpected },
      context
    );
  }
}

export class StringAssertion extends ValueAssertion<string> {
  override isEqualTo(expected: string, options: CaseOptions = {}): AssertionChain {
    const { ignoreCase = false, ...context } = options;
    if (!ignoreCase) return super.isEqualTo(expected, context);

    return this.check(
      equalsIgnoringCase(this.value, expected),
      { kind: 'equal', reached: this.value, expected },
      context
    );
  }

  override isNotEqualTo(notExpected: string, options: CaseOptions = {}): AssertionChain {
    const { ignoreCase = false, ...context } = options;
    if (!ignoreCase) return super.isNotEqualTo(notExpected, context);

    return this.check(
      !equalsIgnoringCase(this.value, notExpected),
      { kind: 'different', reached: this.value, expected: notExpected },
      context
    );
  }
}

export class ProcedureAssertion extends ValueAssertion<Procedure> {
  /**
   * Runs the captured procedure and passes iff it throws an instance of
   * `exceptionClass`. Throwing anything else, or nothing, fails.
   *
   * @throws If the procedure returns a promise: the rejection could not be
   *   observed synchronously.
   */
  expectException<E>(
    exceptionClass: ExceptionClass<E>,
    context?: AssertionContext
  ): AssertionChain {
    const thrown = invoke(this.value);
    return this.check(
      thrown.threw && thrown.error instanceof exceptionClass,
      { kind: 'exception', expectedException: exceptionClass.name, thrown },
      context
    );
  }
}

function invoke(procedure: Procedure): ThrownResult {
  let result: unknown;
  try {
    result = procedure();
  } catch (error) {
    return { threw: true, error };
  }

  if (isPromiseLike(result)) {
    throw new Error('Asynchronous procedures are not supported by expectException.');
  }
  return { threw: false };
}

/**
 * Captures a value and returns the assertions available for its type.
 *
 * ```ts
 * assertThat(2 + 2).isEqualTo(4);
 * assertThat('abc').isEqualTo('ABC', { ignoreCase: true });
 * assertThat(() => parse('')).expectException(SyntaxError);
 * assertThat(0.1 + 0.2).isEqualTo(0.3, { tolerance: 1e-9 }).andThat(list).isNotNull();
 * ```
 */
export function assertThat(value: number): NumberAssertion;
export function assertThat(value: string): StringAssertion;
export function assertThat(value: Procedure): ProcedureAssertion;
export function assertThat<T>(value: T): ValueAssertion<T>;
export function assertThat(value: unknown): ValueAssertion<unknown> {
  if (isNumber(value)) return new NumberAssertion(value);
  if (isString(value)) return new StringAssertion(value);
  if (isFunction(value)) return new ProcedureAssertion(value);
  return new ValueAssertion(value);
}
