import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request body cannot be serialized. Always surfaces before any network call.
 */
export class EncodingError extends Error {
  /** EncodingError error-name */
  static name = 'EncodingError';
}

/**
 * Type guard for {@link EncodingError}.
 */
export function isEncodingError(error: unknown): error is EncodingError {
  return isErrorType(EncodingError, error);
}

/**
 * Extract an {@link EncodingError} from an unknown error value, following nested causes.
 */
export function getEncodingError(error: unknown): null | EncodingError {
  return unwrapErrorType(EncodingError, error);
}
