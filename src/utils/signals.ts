import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { toError } from './wrap.js';

/** A single armed deadline: its signal, whether it fired, and a way to disarm it. */
export interface Deadline {
  /** Aborts with a {@link TimeoutError} once the deadline passes. */
  readonly signal: AbortSignal;
  /** True once the timer fired. Never reverts. */
  expired(): boolean;
  /** Disarms the timer. Calling it again, or after expiry, does nothing. */
  release(): void;
}

/**
 * Arms a timer that aborts a fresh signal after `ms` milliseconds.
 *
 * When `ms` is `false`, no timer is armed and the signal never aborts on its own.
 * A non-positive duration fires on the next tick.
 *
 * @param ms - Deadline in milliseconds, or `false` to disable.
 * @param url - Request target, used in the timeout message.
 */
export function createDeadline(ms: number | false, url?: string): Deadline {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  if (ms !== false) {
    const target = url ? ` for ${url}` : '';
    timer = setTimeout(
      () => controller.abort(new TimeoutError(`error deadline of ${ms}ms exceeded${target}`, url)),
      Math.max(ms, 0),
    );
  }

  return {
    signal: controller.signal,
    expired: () => controller.signal.aborted,
    release: () => {
      clearTimeout(timer);
      timer = undefined;
    },
  };
}

/** A signal derived from several sources, and the way to detach it from them. */
export interface LinkedSignal {
  /** Aborts when any source aborts. `null` when no source was given. */
  readonly signal: AbortSignal | null;
  /** Removes the listeners added to the sources. Calling it again does nothing. */
  release(): void;
}

const NO_LINK: LinkedSignal = { signal: null, release: () => {} };

/**
 * Links multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, the linked signal is `null`.
 * - If a single signal is provided, it is used as-is and nothing is attached to it.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort when any of the source signals abort.
 * - Attempts to preserve the abort `reason` when available, otherwise
 *   aborts with an {@link AbortError}.
 *
 * Sources usually outlive the link (a client-wide or caller signal shared by many calls), so
 * the caller must `release()` once the work the link guards has settled.
 *
 * @param signals - List of signals to link (nullable/undefined allowed).
 */
export function linkSignals(signals: Array<AbortSignal | null | undefined>): LinkedSignal {
  const active: AbortSignal[] = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return NO_LINK;
  }

  if (active.length === 1) {
    return { signal: active[0], release: NO_LINK.release };
  }

  const controller = new AbortController();
  const listeners: VoidFunction[] = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    release();
    if (source.reason !== undefined) {
      controller.abort(source.reason);
      return;
    }

    controller.abort(new AbortError('error signal triggered with unknown reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}

/**
 * Settles with `promise`, unless `signal` aborts first, in which case it rejects with the
 * abort reason. Clients that ignore the signal are still cut off at the deadline.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | null | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(toError(signal.reason));

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(toError(error));
      },
    );
  });
}
