/**
 * Fetch entrypoint: exports the fetch-based transport and header utilities.
 * @module
 */
export { FetchTransport, type FetchTransportOptions } from './client.js';
export { mergeHeaderOptions } from './utils.js';
