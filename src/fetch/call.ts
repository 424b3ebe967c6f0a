import { InvalidStatusError } from '../error/invalidStatusError.js';
import { TimeoutError } from '../error/timeoutError.js';
import type { HeaderOptions, HttpClient, HttpMethod, StatusValidator } from '../types/request.js';
import { abortable, createDeadline, type Deadline, linkSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync, toError } from '../utils/wrap.js';
import { appendHeaders, isInvalidStatus } from './utils.js';

/** Request body shapes the call primitive sends as-is. */
export type CallBody = string | URLSearchParams;

/** Options for {@link call}. */
export interface CallOptions {
  /** Client that performs the round trip. */
  client: HttpClient;
  /** Absolute target URL. */
  url: string;
  method: HttpMethod;
  /** Sent exactly as given; nothing is added. */
  headers?: HeaderOptions;
  body?: CallBody | null;
  /** Milliseconds before the call is cut off, or `false` for no deadline. */
  deadline: number | false;
  /** Caller's own cancellation. Aborting it does not count as a timeout. */
  signal?: AbortSignal;
  /**
   * Decides whether a response is a failure.
   * @default 4xx and 5xx are failures
   */
  statusValidator?: StatusValidator;
}

/** Cancellation scope of one call: its merged signal and its deadline. */
export interface CallScope {
  signal: AbortSignal;
  deadline: Deadline;
}

/**
 * Runs `fn` inside a fresh deadline scope derived from `parent`.
 * The deadline timer and the link to `parent` are released on every exit path; sibling calls sharing
 * `parent` are unaffected.
 */
export async function withDeadline<T>(
  deadline: number | false,
  url: string,
  parent: AbortSignal | undefined,
  fn: (scope: CallScope) => Promise<T>,
): Promise<T> {
  const timer = createDeadline(deadline, url);
  const link = linkSignals([parent, timer.signal]);

  try {
    return await fn({ signal: link.signal ?? timer.signal, deadline: timer });
  } finally {
    timer.release();
    link.release();
  }
}

/**
 * Timeout error for `url` when the scope's deadline is what stopped the call, otherwise `err` unchanged.
 */
export function timeoutOr(err: Error, scope: CallScope, url: string): Error {
  if (!scope.deadline.expired()) {
    return err;
  }

  return new TimeoutError(`error service at "${url}" timed out`, url, { cause: err });
}

/**
 * Issues one request inside an existing scope and applies the status validator.
 * Nothing is sent when the scope is already cancelled.
 * The response of a failed status is only reachable through the returned {@link InvalidStatusError}.
 */
export async function dispatch(
  { client, url, method, headers, body, statusValidator = isInvalidStatus }: Omit<CallOptions, 'deadline' | 'signal'>,
  scope: CallScope,
): SafeWrapAsync<Error, Response> {
  if (scope.signal.aborted) {
    return [timeoutOr(toError(scope.signal.reason), scope, url), null];
  }

  const [errRequest, request] = safeWrap(
    () =>
      new Request(url, {
        method,
        headers: appendHeaders(new Headers(), headers),
        body: body ?? null,
        signal: scope.signal,
      }),
  );
  if (errRequest) {
    return [new Error(`error building ${method} request for ${url}`, { cause: errRequest }), null];
  }

  const [errResponse, response] = await safeWrapAsync(() => abortable(client(request), scope.signal));
  if (errResponse) {
    return [timeoutOr(errResponse, scope, url), null];
  }

  if (statusValidator(response)) {
    return [new InvalidStatusError(response, `error invalid HTTP status ${response.status} from ${method} ${url}`), null];
  }

  return [null, response];
}

/**
 * Performs a single deadline-bounded HTTP call.
 *
 * - The deadline cancels the call's own derived signal; that surfaces as {@link TimeoutError}.
 * - Any other transport failure is returned unchanged.
 * - A response the validator rejects is returned only inside {@link InvalidStatusError}, body unread.
 *
 * @returns A promise resolving to `[error, response]`.
 */
export function call(opts: CallOptions): SafeWrapAsync<Error, Response> {
  return withDeadline(opts.deadline, opts.url, opts.signal, (scope) => dispatch(opts, scope));
}
