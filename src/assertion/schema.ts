import type { StandardSchemaV1 } from '@standard-schema/spec';

import type { FailureIssue } from './failure';

/**
 * Outcome of validating a reached value against a Standard Schema.
 */
export type SchemaCheck =
  | { valid: true; value: unknown }
  | { valid: false; issues: readonly FailureIssue[] };

function formatIssuePath(path: StandardSchemaV1.Issue['path']): string {
  if (!path || path.length === 0) return '(root)';
  return path
    .map(segment => String(typeof segment === 'object' ? segment.key : segment))
    .join('.');
}

/**
 * Validates a value using a Standard Schema V1 compliant validator (Zod,
 * Valibot, ArkType, ...).
 *
 * Uses the `~standard.validate` result pattern instead of library-specific
 * methods such as `parse`, so issues come back as data and never throw.
 *
 * @throws
 * - If the object is not a Standard Schema (missing `~standard`).
 * - If the validator returns a Promise: assertions run synchronously.
 */
export function checkSchema(schema: StandardSchemaV1, value: unknown): SchemaCheck {
  if (!('~standard' in schema)) {
    throw new Error(
      'The schema is invalid. Expected an object with the "~standard" property (e.g. Zod, Valibot), but received a plain object.'
    );
  }

  const result = schema['~standard'].validate(value);

  if (result instanceof Promise) {
    throw new Error('Async schema validation is not supported in assertions.');
  }

  if (result.issues) {
    return {
      valid: false,
      issues: result.issues.map(issue => ({
        path: formatIssuePath(issue.path),
        message: issue.message
      }))
    };
  }

  return { valid: true, value: result.value };
}
