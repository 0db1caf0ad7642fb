import { EncodingError } from '../error/encodingError.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/**
 * Type-erased request body. Serialization is deferred until the request is sent.
 */
export interface Serializable {
  /** Value of the `Content-Type` header sent along with the body. */
  readonly contentType: string;
  /** Serializes the body; failures are returned as an {@link EncodingError}. */
  serialize(): SafeWrap<Error, Uint8Array>;
}

const encoder = new TextEncoder();

/**
 * Boxes any JSON-encodable value.
 *
 * @example
 * new JSONBody({ login: 'octocat' }).serialize(); // [null, bytes of '{"login":"octocat"}']
 */
export class JSONBody implements Serializable {
  readonly contentType = 'application/json';
  /** Boxed value, serialized on every call to `serialize`. */
  #value: unknown;

  /** Boxes a value for deferred JSON serialization */
  constructor(value: unknown) {
    this.#value = value;
  }

  /** Boxed value */
  get value(): unknown {
    return this.#value;
  }

  serialize(): SafeWrap<Error, Uint8Array> {
    // JSON.stringify returns undefined for functions, symbols and undefined
    const [errJson, json] = safeWrap<string | undefined>(() => JSON.stringify(this.#value));
    if (errJson) {
      return [new EncodingError('error serializing JSON body', { cause: errJson }), null];
    }

    if (json === undefined) {
      return [new EncodingError(`error serializing JSON body, ${typeof this.#value} has no JSON representation`), null];
    }

    return [null, encoder.encode(json)];
  }
}

/**
 * Boxes a body value, `null` and `undefined` meaning no body.
 */
export function boxBody(body: unknown): Serializable | undefined {
  if (body === null || body === undefined) {
    return undefined;
  }

  return new JSONBody(body);
}
