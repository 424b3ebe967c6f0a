import { isErrorType } from './isErrorType.js';

/**
 * Error raised when the caller's own signal aborts a request (as opposed to the deadline firing).
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
