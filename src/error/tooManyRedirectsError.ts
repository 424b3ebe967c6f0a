import { isErrorType } from './isErrorType.js';

/**
 * Error raised by a redirect policy that refuses to follow another redirect.
 */
export class TooManyRedirectsError extends Error {
  /** TooManyRedirectsError error-name */
  static name = 'TooManyRedirectsError';
  /** Redirects the policy allows */
  #limit: number;

  /** Creates a new instance of a TooManyRedirectsError for the given limit */
  constructor(message: string, limit: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#limit = limit;
  }

  /** Redirects the policy allows */
  get limit(): number {
    return this.#limit;
  }
}

/**
 * Type guard for {@link TooManyRedirectsError}.
 */
export function isTooManyRedirectsError(error: unknown): error is TooManyRedirectsError {
  return isErrorType(TooManyRedirectsError, error);
}
