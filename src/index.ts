/**
 * Root entrypoint: re-exports the request/response types, the client, the fetch transport,
 * logging and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';

export * from './error/index.js';

/**
 * Default transport on top of `fetch`, and the header merging it shares with the client.
 */
export * from './fetch/index.js';

/**
 * Leveled logger accepted by {@link APIClient}, with redaction of credentials.
 */
export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogMetadata,
  type LogSink,
  redact,
  silentLogger,
} from './logging/index.js';

/**
 * Wire-level shapes exchanged between the client and its transport.
 */
export {
  BODY_METHODS,
  type BodyMethod,
  type Exchange,
  HTTP_METHODS,
  type HeaderOptions,
  type HttpMethod,
  isBodyMethod,
  type QueryItem,
  type QueryItems,
  type ReceivedResponse,
  type SentRequest,
  type TransferMetrics,
  type Transport,
  type TransportOptions,
} from './types/request.js';

/** Query string and URL helpers used to build the outgoing request. */
export { constructUrl } from './utils/constructUrl.js';
export { queryString } from './utils/queryString.js';

/** Error-first tuple types returned by every fallible operation. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
