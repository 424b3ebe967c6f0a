import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request value cannot be serialized. The serializer's own error is the `cause`.
 */
export class MarshalError extends Error {
  /** MarshalError error-name */
  static name = 'MarshalError';
}

/**
 * Type guard for {@link MarshalError}.
 */
export function isMarshalError(error: unknown): error is MarshalError {
  return isErrorType(MarshalError, error);
}
