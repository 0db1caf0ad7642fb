/**
 * Error entrypoint: exports the error taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Abort reason used when a request is aborted without a more specific reason. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';
/** Error representing a error constructing URL. */
/** Extract an {@link ConstructURLError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConstructURLError}. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error representing response bytes that do not match the expected result shape. */
export { DecodingError, getDecodingError, isDecodingError } from './decodingError.js';
/** Error representing a request body that cannot be serialized. */
export { EncodingError, getEncodingError, isEncodingError } from './encodingError.js';
/** Error representing a response with an unacceptable status code. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Abort reason used when an exchange exceeds the configured timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error representing a failed exchange with the transport. */
export { getTransportError, isTransportError, TransportError, type TransportErrorCode } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error raised when a decoded value is rejected by its schema. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
