import { DecodingError } from '../error/decodingError.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type {
  BytesDecoder,
  DecoderType,
  EmptyDecoder,
  ResponseDecoder,
  SchemaType,
  StringDecoder,
} from './types.js';

/** Accepts any parsed JSON value unchanged. */
const anyJson: SchemaType<unknown> = {
  '~standard': {
    version: 1,
    vendor: 'envelope-http',
    validate: (value) => ({ value }),
  },
};

const bytes: BytesDecoder<Uint8Array> = { type: 'data', from: (data) => data };
const text: StringDecoder<string> = { type: 'text', from: (value) => value };
const empty: EmptyDecoder<void> = { type: 'void', from: () => undefined };

/** Strict decoder, throws a `TypeError` on malformed input. */
const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Expect the raw response bytes. The body is never parsed, whatever its `Content-Type`.
 */
export function asData(): ResponseDecoder<Uint8Array> {
  return bytes;
}

/**
 * Expect UTF-8 text.
 */
export function asText(): ResponseDecoder<string> {
  return text;
}

/**
 * Expect no value. The body is ignored even when present.
 */
export function asVoid(): ResponseDecoder<void> {
  return empty;
}

/**
 * Expect a JSON value, validated by `schema` when given. An empty body fails to decode.
 *
 * @example
 * const User = z.object({ login: z.string() });
 * TypedRequest.get('/user', { response: asJson(User) });
 */
export function asJson(): ResponseDecoder<unknown>;
export function asJson<T>(schema: SchemaType<T>): ResponseDecoder<T>;
export function asJson<T>(schema?: SchemaType<T>): ResponseDecoder<unknown> {
  return { type: 'json', schema: schema ?? anyJson };
}

/**
 * Expect a JSON value or nothing: an empty body decodes to `null`, anything else
 * is decoded exactly like {@link asJson}.
 */
export function asOptional(): ResponseDecoder<unknown>;
export function asOptional<T>(schema: SchemaType<T>): ResponseDecoder<T | null>;
export function asOptional<T>(schema?: SchemaType<T>): ResponseDecoder<unknown> {
  return { type: 'optional', schema: schema ?? anyJson, absent: null };
}

/**
 * Converts raw response bytes into the value expected by `decoder`.
 *
 * | decoder    | empty body       | non-empty body                      |
 * |------------|------------------|-------------------------------------|
 * | `data`     | empty bytes      | bytes, verbatim                     |
 * | `text`     | `''`             | strict UTF-8 text                   |
 * | `void`     | `undefined`      | `undefined`, bytes are not parsed   |
 * | `optional` | `null`           | JSON, validated against the schema  |
 * | `json`     | `DecodingError`  | JSON, validated against the schema  |
 *
 * Every failure is a {@link DecodingError} carrying the bytes and the decoder type.
 */
export async function decodeResponse<T>(data: Uint8Array, decoder: ResponseDecoder<T>): SafeWrapAsync<DecodingError, T> {
  switch (decoder.type) {
    case 'data':
      return [null, decoder.from(data)];
    case 'void':
      return [null, decoder.from()];
    case 'text': {
      const [errText, value] = decodeText(data, decoder.type);
      if (errText) {
        return [errText, null];
      }

      return [null, decoder.from(value)];
    }
    case 'optional':
      if (data.byteLength === 0) {
        return [null, decoder.absent];
      }

      return decodeJson(data, decoder.schema, decoder.type);
    case 'json':
      if (data.byteLength === 0) {
        return [new DecodingError('error decoding JSON, response body is empty', data, decoder.type), null];
      }

      return decodeJson(data, decoder.schema, decoder.type);
  }
}

/**
 * Decodes bytes as strict UTF-8.
 */
function decodeText(data: Uint8Array, target: DecoderType): SafeWrap<DecodingError, string> {
  const [errText, value] = safeWrap(() => utf8.decode(data));
  if (errText) {
    return [new DecodingError('error decoding response body as UTF-8 text', data, target, { cause: errText }), null];
  }

  return [null, value];
}

/**
 * Parses bytes as JSON and validates the result against `schema`.
 */
async function decodeJson<T>(data: Uint8Array, schema: SchemaType<T>, target: DecoderType): SafeWrapAsync<DecodingError, T> {
  const [errText, value] = decodeText(data, target);
  if (errText) {
    return [errText, null];
  }

  const [errJson, json] = safeWrap<unknown>(() => JSON.parse(value));
  if (errJson) {
    return [new DecodingError('error decoding JSON response body', data, target, { cause: errJson }), null];
  }

  const [errValidate, validated] = await validator(json, schema);
  if (errValidate) {
    return [new DecodingError('error decoding JSON, value does not match schema', data, target, { cause: errValidate }), null];
  }

  return [null, validated];
}
