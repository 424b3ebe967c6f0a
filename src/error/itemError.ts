import { isErrorType } from './isErrorType.js';

/** Stream item carried a value of a different type than the one asked for. */
export class WrongCastTypeError extends Error {
  /** WrongCastTypeError error-name */
  static name = 'WrongCastTypeError';
}

/** Stream item carried neither a value nor an error. */
export class EmptyItemError extends Error {
  /** EmptyItemError error-name */
  static name = 'EmptyItemError';
}

/**
 * Type guard for {@link WrongCastTypeError}.
 */
export function isWrongCastTypeError(error: unknown): error is WrongCastTypeError {
  return isErrorType(WrongCastTypeError, error);
}

/**
 * Type guard for {@link EmptyItemError}.
 */
export function isEmptyItemError(error: unknown): error is EmptyItemError {
  return isErrorType(EmptyItemError, error);
}
