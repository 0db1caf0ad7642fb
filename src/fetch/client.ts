import { TransportError } from '../error/transportError.js';
import type { Exchange, SentRequest, Transport, TransportOptions } from '../types/request.js';
import { abortedTransportError } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /**
   * Fetch implementation to use.
   * @default globalThis.fetch
   */
  fetch?: typeof fetch;
  /**
   * Redirect policy.
   * Passed through to `fetch`.
   */
  redirect?: RequestInit['redirect'];
  /** Clock used for metrics, in milliseconds. */
  now?: () => number;
}

/**
 * {@link Transport} on top of the `fetch` API that:
 * - sends the already-built request (URL, merged headers, serialized body) as-is,
 * - reads the whole body as bytes,
 * - records the timings of the exchange,
 * - returns error-first tuples via {@link SafeWrapAsync}, failures being {@link TransportError}s.
 */
export class FetchTransport implements Transport {
  #fetch?: typeof fetch;
  #redirect?: RequestInit['redirect'];
  #now: () => number;

  /** Creates a new fetch-based transport */
  constructor(opts: FetchTransportOptions = {}) {
    this.#fetch = opts.fetch;
    this.#redirect = opts.redirect;
    this.#now = opts.now ?? (() => performance.now());
  }

  /**
   * Performs the exchange described by `request`.
   *
   * Errors:
   * - An aborted `signal` yields a `cancelled` (or `timeout`) TransportError.
   * - Anything else thrown by `fetch` or while reading the body yields a `network` TransportError.
   *
   * @param request - Fully-resolved outgoing request.
   * @param opts - Abort signal for the exchange.
   * @returns A promise resolving to `[error, exchange]`.
   */
  async perform(request: SentRequest, { signal }: TransportOptions = {}): SafeWrapAsync<Error, Exchange> {
    // Resolved per call so a fetch stubbed after construction is picked up
    const fetchFn = this.#fetch ?? globalThis.fetch;
    const startTime = this.#now();

    const [errFetch, res] = await safeWrapAsync(() =>
      fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        ...(this.#redirect && { redirect: this.#redirect }),
        ...(signal && { signal }),
      }),
    );

    if (errFetch) {
      return [this.#failure(request, errFetch, signal), null];
    }

    const responseStartTime = this.#now();
    const [errBody, buffer] = await safeWrapAsync(() => res.arrayBuffer());
    if (errBody) {
      return [this.#failure(request, errBody, signal), null];
    }

    const endTime = this.#now();
    const data = new Uint8Array(buffer);

    return [
      null,
      {
        data,
        response: {
          status: res.status,
          statusText: res.statusText,
          headers: res.headers,
          url: res.url || request.url,
        },
        metrics: {
          startTime,
          responseStartTime,
          endTime,
          duration: endTime - startTime,
          bytesReceived: data.byteLength,
        },
      },
    ];
  }

  /**
   * Classifies a thrown error: aborted exchanges are `cancelled`/`timeout`, the rest `network`.
   */
  #failure(request: SentRequest, cause: Error, signal?: AbortSignal): TransportError {
    if (signal?.aborted) {
      return abortedTransportError(signal, `${request.method} ${request.url} exchange`);
    }

    return new TransportError(`error performing ${request.method} ${request.url} exchange`, 'network', { cause });
  }
}
