import { isErrorType } from './isErrorType.js';

/**
 * Abort reason used when an exchange exceeds the configured timeout.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  #timeout: number;

  /** Creates a new instance of a TimeoutError for the elapsed timeout */
  constructor(message: string, timeout: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#timeout = timeout;
  }

  /** Timeout that elapsed, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
