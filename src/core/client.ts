import { AbortError } from '../error/abortError.js';
import { EncodingError } from '../error/encodingError.js';
import { HTTPError } from '../error/httpError.js';
import { TransportError } from '../error/transportError.js';
import { FetchTransport } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { type Logger, silentLogger } from '../logging/index.js';
import { type HeaderOptions, type HttpMethod, isBodyMethod, type SentRequest, type Transport } from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { abortedTransportError, createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { asData, decodeResponse } from './decoders.js';
import type { TypedRequest } from './request.js';
import { TypedResponse } from './response.js';

/** Configuration for constructing an {@link APIClient}. */
export interface ClientConfig {
  /** Base URL relative descriptor paths are joined to (e.g. `https://api.example.com/v1`). */
  baseUrl: string;
  /** Default headers, merged over `Accept: application/json` and under descriptor headers. */
  headers?: HeaderOptions;
  /**
   * Exchange timeout in milliseconds, `false` to disable.
   * @default 60000
   */
  timeout?: number | false;
  /**
   * Decides which status codes are acceptable; others fail with an {@link HTTPError}.
   * @default 2xx
   */
  validateStatus?: (status: number) => boolean;
  /** Performs the exchanges. Defaults to {@link FetchTransport}. */
  transport?: Transport;
  /** Receives debug lines for every exchange and warnings for failures. Silent by default. */
  logger?: Logger;
}

/** Per-send options. */
export interface SendOptions {
  /** Cancels the exchange; the send then fails with a `cancelled` TransportError. */
  signal?: AbortSignal;
  /** Overrides the client timeout for this exchange. */
  timeout?: number | false;
  /** Headers merged over everything else, descriptor headers included. */
  headers?: HeaderOptions;
}

/** Accepts 2xx status codes. */
function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Sends {@link TypedRequest}s and returns {@link TypedResponse}s:
 * - serializes the body and builds URL and headers before any network call,
 * - performs the exchange through a pluggable {@link Transport} with timeout and cancellation,
 * - rejects unacceptable status codes,
 * - decodes the body with the decoder of the request.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync} or {@link SafeWrap}; errors are
 * returned as-is: {@link EncodingError}, {@link TransportError}, {@link HTTPError}, `DecodingError`
 * or `ConstructURLError`.
 *
 * @example
 * const client = new APIClient({ baseUrl: 'https://api.example.com' });
 * const [err, response] = await client.send(TypedRequest.get('/user', { response: asJson(User) }));
 */
export class APIClient {
  /** Transport performing the exchanges. */
  #transport: Transport;
  #logger: Logger;
  #baseUrl: string;
  /** Default headers applied to every request. */
  #headers: Headers;
  #timeout: number | false;
  #validateStatus: (status: number) => boolean;
  /** Aborted on dispose, cancelling every in-flight exchange. */
  #abortController = new AbortController();

  /**
   * Creates a client from its configuration.
   */
  constructor({
    baseUrl,
    headers,
    timeout = 60_000,
    validateStatus = isSuccessStatus,
    transport = new FetchTransport(),
    logger = silentLogger,
  }: ClientConfig) {
    this.#baseUrl = baseUrl;
    this.#headers = mergeHeaderOptions({ Accept: 'application/json' }, headers);
    this.#timeout = timeout;
    this.#validateStatus = validateStatus;
    this.#transport = transport;
    this.#logger = logger;
  }

  /**
   * Updates the configuration at runtime. Headers are merged with the current defaults,
   * a `null` value removing a default header.
   */
  config(opts: Partial<ClientConfig>) {
    const { baseUrl, headers, timeout, validateStatus, transport, logger } = opts;

    if (baseUrl !== undefined) {
      this.#baseUrl = baseUrl;
    }

    if (headers) {
      this.#headers = mergeHeaderOptions(this.#headers, headers);
    }

    if (timeout !== undefined) {
      this.#timeout = timeout;
    }

    if (validateStatus) {
      this.#validateStatus = validateStatus;
    }

    if (transport) {
      this.#transport = transport;
    }

    if (logger) {
      this.#logger = logger;
    }
  }

  /**
   * Cancels every in-flight exchange; later sends fail immediately with a `cancelled` TransportError.
   */
  dispose() {
    this.#abortController.abort(new AbortError('error client was disposed'));
  }

  /**
   * Returns the absolute URL `send` would target for `request`, query string included.
   */
  url<Result>(request: TypedRequest<Result>): SafeWrap<Error, string> {
    return constructUrl(this.#baseUrl, request.path, request.query);
  }

  /**
   * Sends `request` and decodes the body with its decoder.
   *
   * @typeParam Result - Expected result of the request, carried by its decoder.
   * @param request - Descriptor of the call.
   * @param opts - Cancellation, timeout and header overrides for this exchange.
   * @returns A promise resolving to `[error, response]`.
   */
  async send<Result>(request: TypedRequest<Result>, opts: SendOptions = {}): SafeWrapAsync<Error, TypedResponse<Result>> {
    const [errPrepare, sent] = this.#prepare(request, opts.headers);
    if (errPrepare) {
      this.#logger.warn('error preparing request', { id: request.id, method: request.method, path: request.path, error: errPrepare.message });
      return [errPrepare, null];
    }

    const timeout = createTimeoutSignal(opts.timeout ?? this.#timeout);
    const linked = mergeSignals([opts.signal, timeout?.signal, this.#abortController.signal]);

    try {
      return await this.#exchange(request, sent, linked?.signal);
    } finally {
      timeout?.release();
      linked?.release();
    }
  }

  /**
   * Sends `request` but keeps the raw body, whatever the decoder of the request.
   */
  data<Result>(request: TypedRequest<Result>, opts?: SendOptions): SafeWrapAsync<Error, TypedResponse<Uint8Array>> {
    return this.send(request.expecting(asData()), opts);
  }

  /**
   * Builds the outgoing request: URL with query string, serialized body, merged headers.
   * Fails before any network call.
   */
  #prepare<Result>(request: TypedRequest<Result>, headers?: HeaderOptions): SafeWrap<Error, SentRequest> {
    const [errUrl, url] = constructUrl(this.#baseUrl, request.path, request.query);
    if (errUrl) {
      return [errUrl, null];
    }

    let body: Uint8Array | null = null;
    const box = request.body;
    if (box) {
      if (!isBodyMethod(request.method)) {
        return [new EncodingError(`error ${request.method} ${url} cannot carry a body`), null];
      }

      // Custom boxes may throw instead of returning a tuple
      const [errThrown, serialized] = safeWrap(() => box.serialize());
      if (errThrown) {
        return [this.#encodingFailure(errThrown, request.method, url), null];
      }

      const [errBody, bytes] = serialized;
      if (errBody) {
        return [this.#encodingFailure(errBody, request.method, url), null];
      }

      body = bytes;
    }

    return [
      null,
      {
        method: request.method,
        url,
        headers: mergeHeaderOptions(
          this.#headers,
          request.body && { 'Content-Type': request.body.contentType },
          request.headers,
          headers,
        ),
        body,
        ...(request.id !== undefined && { id: request.id }),
      },
    ];
  }

  /**
   * Performs the exchange, validates the status and decodes the body.
   * A cancelled exchange is never decoded.
   */
  async #exchange<Result>(
    request: TypedRequest<Result>,
    sent: SentRequest,
    signal?: AbortSignal,
  ): SafeWrapAsync<Error, TypedResponse<Result>> {
    const context = `${sent.method} ${sent.url} exchange`;
    if (signal?.aborted) {
      return [abortedTransportError(signal, context), null];
    }

    this.#logger.debug('sending request', { id: sent.id, method: sent.method, url: sent.url, headers: sent.headers });

    const [errThrown, result] = await safeWrapAsync(() => this.#transport.perform(sent, signal && { signal }));
    if (signal?.aborted) {
      const err = abortedTransportError(signal, context);
      this.#logger.warn('request cancelled', { id: sent.id, method: sent.method, url: sent.url, code: err.code });
      return [err, null];
    }

    if (errThrown) {
      return [this.#transportFailure(errThrown, sent, context), null];
    }

    const [errTransport, exchange] = result;
    if (errTransport) {
      return [this.#transportFailure(errTransport, sent, context), null];
    }

    const { data, response, metrics } = exchange;
    this.#logger.debug('received response', {
      id: sent.id,
      method: sent.method,
      url: sent.url,
      status: response.status,
      bytes: data.byteLength,
      duration: metrics?.duration,
    });

    if (!this.#validateStatus(response.status)) {
      const err = new HTTPError(response, data, `error unacceptable status code ${response.status} in ${context}`);
      this.#logger.warn('unacceptable status code', { id: sent.id, method: sent.method, url: sent.url, status: response.status });
      return [err, null];
    }

    const [errDecode, value] = await decodeResponse(data, request.response);
    if (errDecode) {
      this.#logger.warn('error decoding response', { id: sent.id, method: sent.method, url: sent.url, target: errDecode.target });
      return [errDecode, null];
    }

    return [null, new TypedResponse({ value, data, request: sent, response, statusCode: response.status, metrics })];
  }

  /**
   * Keeps encoding errors as-is and wraps anything else a custom body fails with.
   */
  #encodingFailure(cause: Error, method: HttpMethod, url: string): EncodingError {
    if (cause instanceof EncodingError) {
      return cause;
    }

    return new EncodingError(`error serializing ${method} ${url} body`, { cause });
  }

  /**
   * Keeps transport errors as-is and wraps anything else a custom transport fails with.
   */
  #transportFailure(cause: Error, sent: SentRequest, context: string): TransportError {
    const err = cause instanceof TransportError ? cause : new TransportError(`error performing ${context}`, 'network', { cause });
    this.#logger.warn('request failed', { id: sent.id, method: sent.method, url: sent.url, code: err.code, error: err.message });
    return err;
  }
}
