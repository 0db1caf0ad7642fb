import type { DecoderType } from '../core/types.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing response bytes that do not match the expected result shape.
 */
export class DecodingError extends Error {
  /** DecodingError error-name */
  static name = 'DecodingError';
  /** Raw response bytes that failed to decode */
  #data: Uint8Array;
  /** Decoder that was expected to produce the value */
  #target: DecoderType;

  /** Creates a new instance of a DecodingError with the offending bytes and target decoder */
  constructor(message: string, data: Uint8Array, target: DecoderType, opts?: ErrorOptions) {
    super(message, opts);
    this.#data = data;
    this.#target = target;
  }

  /** Raw response bytes that failed to decode */
  get data(): Uint8Array {
    return this.#data;
  }

  /** Decoder that was expected to produce the value */
  get target(): DecoderType {
    return this.#target;
  }
}

/**
 * Type guard for {@link DecodingError}.
 */
export function isDecodingError(error: unknown): error is DecodingError {
  return isErrorType(DecodingError, error);
}

/**
 * Extract a {@link DecodingError} from an unknown error value, following nested causes.
 */
export function getDecodingError(error: unknown): null | DecodingError {
  return unwrapErrorType(DecodingError, error);
}
