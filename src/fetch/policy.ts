import { TooManyRedirectsError } from '../error/tooManyRedirectsError.js';

/**
 * Decides whether the next redirect may be followed.
 *
 * @param request - The request about to be sent to the redirect target.
 * @param via - Requests already sent, oldest first.
 * @returns An error to stop with, or `null` to follow.
 */
export type RedirectPolicy = (request: Request, via: readonly Request[]) => Error | null;

/**
 * Policy that follows at most `limit` redirects.
 */
export function maxRedirects(limit: number): RedirectPolicy {
  return (_request, via) => {
    if (via.length > limit) {
      return new TooManyRedirectsError(`error stopped after ${limit} redirect${limit === 1 ? '' : 's'}`, limit);
    }

    return null;
  };
}

/** Follows a single redirect and refuses the second one. */
export const oneRedirect: RedirectPolicy = maxRedirects(1);
