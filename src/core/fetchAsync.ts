import type { StandardSchemaV1 } from '@standard-schema/spec';
import { getInvalidStatusError } from '../error/invalidStatusError.js';
import { Single } from '../stream/single.js';
import type { ExponentialBackoffOptions } from '../utils/backoff.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import { linkSignals } from '../utils/signals.js';
import { type EnvelopeOf, type FetchOptions, fetchTyped, releaseResponse } from './fetch.js';

/** Retry settings layered on top of {@link FetchOptions}. */
export interface RetryFetchOptions {
  /** First backoff delay in milliseconds. */
  backoffInterval: number;
  /** Retries after the first attempt; `0` means exactly one attempt. */
  maxRetries: number;
  /** Remaining exponential-backoff tuning. */
  backoff?: Omit<ExponentialBackoffOptions, 'initialInterval'>;
  /**
   * Return `true` to stop retrying on this error.
   * @default every error is retried
   */
  suppress?: (err: Error) => boolean;
}

/** Options for {@link fetchAsync}. */
export type FetchAsyncOptions<S extends StandardSchemaV1> = FetchOptions<S> & RetryFetchOptions;

/** Frees the unread body held by an invalid-status failure that a retry replaces. */
async function releaseSuperseded(err: Error, logger: Logger): Promise<void> {
  const invalid = getInvalidStatusError(err);
  if (invalid) {
    await releaseResponse(invalid.response, logger);
  }
}

/**
 * Typed fetch as a lazy single-item stream with exponential-backoff retry.
 *
 * Nothing is sent until the result is observed. Each attempt re-encodes the request and issues a
 * fresh call; attempts never overlap. Any error is retried unless `suppress` says otherwise.
 * The response body of a failed attempt is released before the next one; only the final
 * failure keeps its body readable for `describeError`.
 *
 * @example
 * const item = await fetchAsync({ ...opts, backoffInterval: 200, maxRetries: 3 }).observe();
 * const [err, envelope] = extract(item);
 */
export function fetchAsync<S extends StandardSchemaV1>(opts: FetchAsyncOptions<S>): Single<EnvelopeOf<S>> {
  const { backoffInterval, maxRetries, backoff, suppress, logger = silentLogger } = opts;

  return Single.defer(async (signal) => {
    const link = linkSignals([opts.signal, signal]);
    try {
      return await fetchTyped({ ...opts, signal: link.signal ?? undefined });
    } finally {
      link.release();
    }
  }).retryWithBackoff({
    ...backoff,
    initialInterval: backoffInterval,
    maxRetries,
    suppress,
    onRetry: (err) => releaseSuperseded(err, logger),
    logger,
  });
}
