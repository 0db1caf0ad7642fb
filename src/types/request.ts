import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the client, the transport and descriptors. */
export type HeaderOptions = Headers | [string, string][] | Record<string, string | null | undefined>;

/** Supported HTTP methods, uppercase as sent on the wire. */
export const HTTP_METHODS = Object.freeze(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS', 'HEAD', 'TRACE'] as const);

/** HTTP method of a request descriptor. */
export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Methods that conventionally carry a request body. */
export type BodyMethod = Extract<HttpMethod, 'POST' | 'PUT' | 'PATCH' | 'DELETE'>;

/** Methods allowed to carry a request body. */
export const BODY_METHODS: readonly BodyMethod[] = Object.freeze(['POST', 'PUT', 'PATCH', 'DELETE'] as const);

/** Type guard for {@link BodyMethod}. */
export function isBodyMethod(method: HttpMethod): method is BodyMethod {
  return BODY_METHODS.some((bodyMethod) => bodyMethod === method);
}

/**
 * A single query item. A missing, `null` or `undefined` value renders the key alone (`?flag`),
 * while an empty string renders `?flag=`.
 */
export type QueryItem = readonly [key: string, value?: string | null];

/** Ordered query items; duplicate keys are kept in order. */
export type QueryItems = readonly QueryItem[];

/** The outgoing request exactly as handed to the transport. */
export interface SentRequest {
  method: HttpMethod;
  /** Absolute URL including the serialized query string. */
  url: string;
  /** Merged headers: client defaults, body content type, then descriptor and per-send headers. */
  headers: Headers;
  /** Serialized body, or `null` when the descriptor carries no body. */
  body: Uint8Array | null;
  /** Descriptor id, forwarded for correlation. */
  id?: string;
}

/** Status line and headers as received. */
export interface ReceivedResponse {
  status: number;
  statusText: string;
  headers: Headers;
  /** Final URL after redirects. */
  url: string;
}

/**
 * Timing of a single exchange, in milliseconds on the `performance.now()` clock.
 */
export interface TransferMetrics {
  startTime: number;
  /** When the status line and headers arrived. */
  responseStartTime: number;
  /** When the last body byte was read. */
  endTime: number;
  duration: number;
  bytesReceived: number;
}

/** Result of a completed exchange, before decoding. */
export interface Exchange {
  data: Uint8Array;
  response: ReceivedResponse;
  metrics?: TransferMetrics;
}

/** Per-exchange options handed to a {@link Transport}. */
export interface TransportOptions {
  /** Aborts the exchange; the transport must reject with a `cancelled` or `timeout` TransportError. */
  signal?: AbortSignal;
}

/**
 * Performs a single HTTP exchange. Implementations return raw bytes and never decode.
 * Failures are returned as a `TransportError`.
 */
export interface Transport {
  perform(request: SentRequest, opts?: TransportOptions): SafeWrapAsync<Error, Exchange>;
}
