/**
 * Error entrypoint: exports the typed error kinds and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error raised when the caller's signal aborts a call. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';
/** Error raised when a request body received server-side cannot be read or decoded. */
export { BadRequestError, isBadRequestError } from './badRequestError.js';
/** Strict-decode violations, all matchable through the umbrella {@link DecodeError}. */
export {
  BodyTooLargeError,
  DecodeError,
  EmptyBodyError,
  getDecodeError,
  isDecodeError,
  MalformedJSONError,
  MultipleJSONValuesError,
  UnknownKeyError,
  WrongJSONTypeError,
} from './decodeError.js';
/** Best-effort structured description of an invalid-status failure. */
export { describeError } from './describe.js';
export type { ErrorDescription } from './describe.js';
/** Error representing a response that failed the status validator, carrying the raw response. */
export { getInvalidStatusError, InvalidStatusError, isInvalidStatusError } from './invalidStatusError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Errors raised when extracting a value out of a stream item. */
export { EmptyItemError, isEmptyItemError, isWrongCastTypeError, WrongCastTypeError } from './itemError.js';
/** Error raised when a value cannot be serialized to JSON. */
export { isMarshalError, MarshalError } from './marshalError.js';
/** Error raised when a required value is `null`. */
export { isNilValueError, NilValueError } from './nilValueError.js';
/** Error representing a retry attempts exhausted. */
export { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';
/** Error representing a retry attempt suppressed and exited from retrying further. */
export { getRetrySuppressedError, isRetrySuppressedError, RetrySuppressedError } from './retrySuppressedError.js';
/** Error raised when a deadline or client timeout fires. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error raised when a redirect policy refuses another hop. */
export { isTooManyRedirectsError, TooManyRedirectsError } from './tooManyRedirectsError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when a schema itself fails while validating. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
