import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import type { Logger } from './logger.js';
import { sleep } from './sleep.js';
import type { SafeWrapAsync } from './wrap.js';

/** Options for retry-function */
export interface RetryOptions<R> {
  /** Function to execute; must return a tuple-style result. */
  fn: () => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   */
  attempts?: number;
  /**
   * Milliseconds to wait before the next attempt, fixed or computed from the attempt that just failed.
   */
  wait?: number | ((attempt: number) => number);
  /**
   * Predicate that decides whether to stop retrying.
   * Return true to stop retrying and surface the error, false to continue.
   */
  errFn?: (e: Error) => boolean;
  /** Called with the error of each attempt that is about to be retried, before the wait. */
  onRetry?: (e: Error, attempt: number) => Promise<void> | void;
  /** Receives a warning for every scheduled retry. */
  logger?: Logger;
}

/**
 * Retry-function to keep retrying a function that can error for X-number
 * attempts with wait-times between each attempt
 *
 * `This is for functions that catches their own errors and return them in a tuple structure like [Error,Response] `
 *
 * @param fn function to retry
 * @param attempts number of retry-attempts we want to perform
 * @param wait how long to wait between attempts
 * @param errFn optional errorFunction on whether we want to skip retrying and propagate the error (true = stop, false = retry and move on)
 * @param onRetry optional hook for the error of an attempt that is being retried; the final error never reaches it
 */
export async function retry<R = unknown>({
  fn,
  attempts = 10,
  wait = 1000,
  errFn,
  onRetry,
  logger,
}: RetryOptions<R>): SafeWrapAsync<Error, R> {
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn();
    if (!err) {
      return [null, data];
    }

    if (typeof errFn === 'function' && errFn(err)) {
      return [new RetrySuppressedError(`error further retries suppressed`, attempt, { cause: err }), null];
    }

    if (attempt > attempts) {
      return [new RetryExhaustedError(`error retries exhausted`, attempt, { cause: err }), null];
    }

    await onRetry?.(err, attempt);
    const delay = typeof wait === 'function' ? wait(attempt) : wait;
    logger?.warn({ attempt, delay, err: err.message }, 'retrying after failure');
    await sleep(delay);
  }
}
