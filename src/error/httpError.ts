import type { ReceivedResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response whose status code was rejected by `validateStatus`.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static name = 'HTTPError';
  /** Response causing the HTTPError */
  #response: ReceivedResponse;
  /** Raw body of the rejected response */
  #data: Uint8Array;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(
    response: ReceivedResponse,
    data: Uint8Array,
    message: string = `HTTP Error: ${response.status}`,
    opts?: ErrorOptions,
  ) {
    super(message, opts);
    this.#response = response;
    this.#data = data;
  }

  /** Response causing the HTTPError */
  get response(): ReceivedResponse {
    return this.#response;
  }

  /** Status code of the rejected response */
  get statusCode(): number {
    return this.#response.status;
  }

  /** Raw body of the rejected response, usually an error payload */
  get data(): Uint8Array {
    return this.#data;
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): null | HTTPError {
  return unwrapErrorType(HTTPError, error);
}
