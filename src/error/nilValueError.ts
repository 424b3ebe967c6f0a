import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request value was passed explicitly as `null`.
 */
export class NilValueError extends Error {
  /** NilValueError error-name */
  static name = 'NilValueError';
}

/**
 * Type guard for {@link NilValueError}.
 */
export function isNilValueError(error: unknown): error is NilValueError {
  return isErrorType(NilValueError, error);
}
