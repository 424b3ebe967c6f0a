import { isErrorType } from './isErrorType.js';

/**
 * Error raised when an incoming request body cannot be read or decoded server-side.
 * The decode failure is the `cause`.
 */
export class BadRequestError extends Error {
  /** BadRequestError error-name */
  static name = 'BadRequestError';
}

/**
 * Type guard for {@link BadRequestError}.
 */
export function isBadRequestError(error: unknown): error is BadRequestError {
  return isErrorType(BadRequestError, error);
}
