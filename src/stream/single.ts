import { type ExponentialBackoffOptions, ExponentialBackoff } from '../utils/backoff.js';
import type { Logger } from '../utils/logger.js';
import { retry } from '../utils/retry.js';
import { abortable } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { emptyItem, errorItem, type Item, valueItem } from './item.js';

/** Hands an item to the subscriber. Only the first call counts. */
export type Emitter<T> = (item: Item<T>) => void;

/** Body of a {@link Single}; runs once per subscription. */
export type Producer<T> = (emit: Emitter<T>, signal?: AbortSignal) => Promise<void> | void;

/** Options for {@link Single.retryWithBackoff}. */
export interface BackoffRetryOptions extends ExponentialBackoffOptions {
  /** Retries after the first attempt. `0` means exactly one attempt. */
  maxRetries: number;
  /**
   * Return `true` to stop retrying on this error.
   * @default every error is retried
   */
  suppress?: (err: Error) => boolean;
  /** Receives the error of every attempt that is retried; the error that ends the loop is never passed. */
  onRetry?: (err: Error) => Promise<void> | void;
  /** Receives a warning per scheduled retry. */
  logger?: Logger;
}

/**
 * Lazy, cold, single-item asynchronous computation.
 *
 * Nothing runs until {@link Single.observe} is called, and every call runs the producer afresh.
 */
export class Single<T> {
  /** Producer run on each subscription */
  #producer: Producer<T>;

  private constructor(producer: Producer<T>) {
    this.#producer = producer;
  }

  /**
   * Creates a single from a producer that emits through a callback.
   * The first emitted item wins; later emissions are dropped.
   */
  static create<T>(producer: Producer<T>): Single<T> {
    return new Single(producer);
  }

  /**
   * Creates a single from a tuple-returning function: a value item on success,
   * an error item on failure, and nothing after that.
   */
  static defer<T>(fn: (signal?: AbortSignal) => SafeWrapAsync<Error, T>): Single<T> {
    return new Single<T>(async (emit, signal) => {
      const [err, data] = await fn(signal);
      if (err) {
        emit(errorItem(err));
        return;
      }

      emit(valueItem(data));
    });
  }

  /**
   * Subscribes and waits for the settled item.
   *
   * - a producer that throws settles with an error item
   * - a producer that returns without emitting settles with an empty item
   * - aborting `signal` settles with an error item carrying the abort reason
   */
  async observe(signal?: AbortSignal): Promise<Item<T>> {
    let first: Item<T> | null = null;
    const emit: Emitter<T> = (item) => {
      first ??= item;
    };

    const run = safeWrapAsync(async () => this.#producer(emit, signal)).then(([err]): Item<T> => {
      if (first) {
        return first;
      }

      return err ? errorItem(err) : emptyItem();
    });

    const [err, item] = await safeWrapAsync(() => abortable(run, signal));
    if (err) {
      return errorItem(err);
    }

    return item;
  }

  /**
   * Re-subscribes to this single while it settles with an error, waiting an exponentially
   * growing delay between attempts. Value and empty items end the loop.
   *
   * Each subscription to the returned single starts a fresh backoff. When attempts run out the
   * error item carries a `RetryExhaustedError` whose `cause` is the last error.
   */
  retryWithBackoff({ maxRetries, suppress, onRetry, logger, ...backoffOpts }: BackoffRetryOptions): Single<T> {
    return new Single<T>(async (emit, signal) => {
      const backoff = new ExponentialBackoff(backoffOpts);

      const [err, item] = await retry<Item<T>>({
        fn: async (): SafeWrapAsync<Error, Item<T>> => {
          const attempt = await this.observe(signal);
          if (attempt.kind === 'error') {
            return [attempt.error, null];
          }

          return [null, attempt];
        },
        attempts: maxRetries,
        wait: () => backoff.next(),
        errFn: (e) => signal?.aborted === true || (suppress?.(e) ?? false),
        onRetry,
        logger,
      });
      if (err) {
        emit(errorItem(err));
        return;
      }

      emit(item);
    });
  }
}
