import { TimeoutError } from '../error/timeoutError.js';
import type { HttpClient } from '../types/request.js';
import { abortable, createDeadline, linkSignals } from '../utils/signals.js';
import { safeWrapAsync } from '../utils/wrap.js';
import type { RedirectPolicy } from './policy.js';
import { releaseBody } from './utils.js';

/** Options to configure a client built by {@link createHttpClient}. */
export interface HttpClientOptions {
  /**
   * Client-wide timeout in milliseconds, covering the request and every redirect hop.
   * @default false
   */
  timeout?: number | false;
  /**
   * Redirect handling: a fetch redirect mode, or a policy consulted before each hop.
   * @default 'follow'
   */
  redirect?: RequestRedirect | RedirectPolicy;
  /**
   * Round-tripper that actually sends each request.
   * @default the platform `fetch`
   */
  transport?: HttpClient;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
/** Dropped when a redirect leaves the origin of the hop that sent it. */
const CREDENTIAL_HEADERS = ['authorization', 'cookie', 'proxy-authorization'];
/** Dropped together with the body when a redirect switches to GET. */
const BODY_HEADERS = ['content-encoding', 'content-language', 'content-location', 'content-type'];

/** Sends requests with the platform `fetch`. */
export const defaultTransport: HttpClient = (request) => fetch(request);

/**
 * Follows redirects by hand so the policy sees every hop before it is sent.
 * 301/302/303 switch to a bodiless GET (except for GET/HEAD), 307/308 resend method and body.
 * Credentials never follow a redirect to another origin, even if a later hop comes back.
 */
async function followRedirects(
  request: Request,
  signal: AbortSignal,
  policy: RedirectPolicy,
  transport: HttpClient,
): Promise<Response> {
  const via: Request[] = [];
  let method = request.method;
  let body = request.body ? await request.arrayBuffer() : null;
  const headers = new Headers(request.headers);
  let hop = new Request(request.url, { method, headers, body, redirect: 'manual', signal });

  while (true) {
    const response = await transport(hop);
    const location = response.headers.get('location');
    if (!REDIRECT_STATUSES.has(response.status) || !location) {
      return response;
    }

    via.push(hop);
    if (response.status === 303 || ((response.status === 301 || response.status === 302) && method !== 'GET' && method !== 'HEAD')) {
      method = 'GET';
      body = null;
      for (const name of BODY_HEADERS) {
        headers.delete(name);
      }
    }

    const target = new URL(location, hop.url);
    if (target.origin !== new URL(hop.url).origin) {
      for (const name of CREDENTIAL_HEADERS) {
        headers.delete(name);
      }
    }

    const next = new Request(target, {
      method,
      headers,
      body,
      redirect: 'manual',
      signal,
    });

    const [errRelease] = await releaseBody(response);
    if (errRelease) {
      throw new Error(`error releasing redirect response from ${hop.url}`, { cause: errRelease });
    }

    const refusal = policy(next, via);
    if (refusal) {
      throw refusal;
    }

    hop = next;
  }
}

/**
 * Builds the shared HTTP client the fetch functions take.
 *
 * The returned client is stateless and safe to share across concurrent calls; nothing
 * about it changes after construction.
 *
 * @example
 * const client = createHttpClient({ timeout: 10_000, redirect: oneRedirect, transport: withLogging(logger) });
 */
export function createHttpClient({
  timeout = false,
  redirect = 'follow',
  transport = defaultTransport,
}: HttpClientOptions = {}): HttpClient {
  return async (request) => {
    const deadline = createDeadline(timeout, request.url);
    const link = linkSignals([request.signal, deadline.signal]);
    const signal = link.signal ?? deadline.signal;

    const send =
      typeof redirect === 'function'
        ? () => followRedirects(request, signal, redirect, transport)
        : () => transport(new Request(request, { redirect, signal }));

    const [err, response] = await safeWrapAsync(() => abortable(send(), signal));
    deadline.release();
    link.release();

    if (err) {
      if (deadline.expired()) {
        throw new TimeoutError(`error client timeout of ${timeout}ms exceeded for ${request.url}`, request.url, {
          cause: err,
        });
      }

      throw err;
    }

    return response;
  };
}
