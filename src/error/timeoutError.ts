import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a call's deadline fires before the call completes.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
  /** Target of the request that timed out, when known */
  #url: string | null;

  /** Creates a new instance of a TimeoutError, optionally annotated with the request URL */
  constructor(message: string, url?: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url ?? null;
  }

  /** Target of the request that timed out */
  get url(): string | null {
    return this.#url;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): null | TimeoutError {
  return unwrapErrorType(TimeoutError, error);
}
