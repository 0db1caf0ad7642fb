import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a decoded JSON value is rejected by its Standard Schema.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError, with accompanying issues */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}; ${formatIssues(issues)}` : message, opts);

    this.issues = issues;
  }
}

/**
 * Renders issues as `path: message` pairs, e.g. `login: Required, id: Expected number`.
 */
function formatIssues(issues: readonly StandardSchemaV1.Issue[]): string {
  return issues
    .map((issue) => {
      const path = (issue.path ?? [])
        .map((segment) => String(typeof segment === 'object' ? segment.key : segment))
        .join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join(', ');
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
