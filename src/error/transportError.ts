import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Why the exchange failed before a response was received.
 * - `network`: connectivity or protocol failure.
 * - `cancelled`: the caller (or client disposal) aborted the exchange.
 * - `timeout`: the configured timeout elapsed.
 */
export type TransportErrorCode = 'network' | 'cancelled' | 'timeout';

/**
 * Error representing a failed exchange with the transport.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';
  /** Failure category */
  #code: TransportErrorCode;

  /** Creates a new instance of a TransportError tagged with a failure code */
  constructor(message: string, code: TransportErrorCode, opts?: ErrorOptions) {
    super(message, opts);
    this.#code = code;
  }

  /** Failure category */
  get code(): TransportErrorCode {
    return this.#code;
  }

  /** Whether the exchange was aborted by the caller */
  get cancelled(): boolean {
    return this.#code === 'cancelled';
  }
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}
