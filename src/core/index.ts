/**
 * Core entrypoint: exports request descriptors, response envelopes, decoders and the client.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Type-erased request bodies; {@link JSONBody} boxes any JSON-encodable value.
 */
export { boxBody, JSONBody, type Serializable } from './body.js';

/**
 * Client that sends {@link TypedRequest}s through a pluggable transport and decodes the results.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync} or {@link SafeWrap}.
 */
export { APIClient, type ClientConfig, type SendOptions } from './client.js';

/** Decoding strategies, one per expected result shape. */
export { asData, asJson, asOptional, asText, asVoid, decodeResponse } from './decoders.js';

export { TypedRequest, type TypedRequestInit } from './request.js';
export { TypedResponse, type TypedResponseInit } from './response.js';

export type {
  BodyRequestOptions,
  BytesDecoder,
  DecoderType,
  EmptyDecoder,
  ExpectedResponse,
  JsonDecoder,
  OptionalJsonDecoder,
  RequestOptions,
  ResponseDecoder,
  SchemaType,
  StringDecoder,
  WithoutResponse,
} from './types.js';
