import type { ReceivedResponse, SentRequest, TransferMetrics } from '../types/request.js';

/** Fields of a {@link TypedResponse}. */
export interface TypedResponseInit<T> {
  value: T;
  data: Uint8Array;
  request: SentRequest;
  response: ReceivedResponse;
  statusCode: number;
  metrics?: TransferMetrics;
}

/**
 * Outcome of one exchange: the decoded value together with the raw body and the metadata
 * of the exchange. Built once per completed exchange and never mutated.
 */
export class TypedResponse<T> {
  /** Decoded body. */
  readonly value: T;
  /** Raw body bytes, kept verbatim whatever the decoder. */
  readonly data: Uint8Array;
  /** The outgoing request as sent, after header merging and query serialization. */
  readonly request: SentRequest;
  readonly response: ReceivedResponse;
  /** Same as `response.status`. */
  readonly statusCode: number;
  /** Timings reported by the transport, if any. */
  readonly metrics?: TransferMetrics;

  constructor({ value, data, request, response, statusCode, metrics }: TypedResponseInit<T>) {
    this.value = value;
    this.data = data;
    this.request = request;
    this.response = response;
    this.statusCode = statusCode;
    this.metrics = metrics;

    Object.freeze(this);
  }

  /**
   * Re-wraps a transformed value, keeping every other field as the same reference.
   *
   * @example
   * const login = response.map((user) => user.login); // TypedResponse<string>
   */
  map<U>(transform: (value: T) => U): TypedResponse<U> {
    return new TypedResponse<U>({
      value: transform(this.value),
      data: this.data,
      request: this.request,
      response: this.response,
      statusCode: this.statusCode,
      metrics: this.metrics,
    });
  }
}
