import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { QueryItems } from '../types/request.js';

/** Schema producing `T` from unknown JSON input. Any Standard Schema implementation (zod, valibot, ...) fits. */
export type SchemaType<T = unknown> = StandardSchemaV1<unknown, T>;

/** Raw bytes are handed over verbatim. */
export interface BytesDecoder<T> {
  readonly type: 'data';
  readonly from: (data: Uint8Array) => T;
}

/** Bytes are decoded as strict UTF-8. */
export interface StringDecoder<T> {
  readonly type: 'text';
  readonly from: (text: string) => T;
}

/** Bytes are ignored. */
export interface EmptyDecoder<T> {
  readonly type: 'void';
  readonly from: () => T;
}

/** Bytes are parsed as JSON and validated; an empty body is a decoding error. */
export interface JsonDecoder<T> {
  readonly type: 'json';
  readonly schema: SchemaType<T>;
}

/** Like {@link JsonDecoder}, but an empty body decodes to `absent`. */
export interface OptionalJsonDecoder<T> {
  readonly type: 'optional';
  readonly schema: SchemaType<T>;
  readonly absent: T;
}

/**
 * Decoding strategy for a response body, selected by the caller through the expected result type.
 * Discriminated by `type`; see `decodeResponse` for the rules of each strategy.
 */
export type ResponseDecoder<T> =
  | BytesDecoder<T>
  | StringDecoder<T>
  | EmptyDecoder<T>
  | JsonDecoder<T>
  | OptionalJsonDecoder<T>;

/** Discriminant of {@link ResponseDecoder}. */
export type DecoderType = ResponseDecoder<unknown>['type'];

/** Options accepted by every method constructor of `TypedRequest`. */
export interface RequestOptions {
  /** Ordered query items, see {@link QueryItems}. */
  query?: QueryItems;
  /** Header overrides merged over the client's defaults. */
  headers?: Record<string, string>;
  /** Opaque identifier for correlation in logs. */
  id?: string;
}

/** Options of the methods that conventionally carry a body (POST, PUT, PATCH, DELETE). */
export interface BodyRequestOptions extends RequestOptions {
  /** JSON-serializable body. `null` and `undefined` mean no body at all. */
  body?: unknown;
}

/** Expected result of a request, given as its decoder. */
export interface ExpectedResponse<Result> {
  response: ResponseDecoder<Result>;
}

/** Options without a decoder: the request resolves to no value. */
export type WithoutResponse<Options> = Options & { response?: never };
