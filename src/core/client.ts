import type { StandardSchemaV1 } from '@standard-schema/spec';
import { AbortError } from '../error/abortError.js';
import { createHttpClient } from '../fetch/client.js';
import { isInvalidStatus, mergeHeaderOptions } from '../fetch/utils.js';
import { Single } from '../stream/single.js';
import type { HttpClient, StatusValidator } from '../types/request.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import { linkSignals } from '../utils/signals.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type BaseFetchOptions, type EnvelopeOf, fetchTyped } from './fetch.js';
import { fetchAsync, type RetryFetchOptions } from './fetchAsync.js';
import type { AsyncRequestOptions, BackoffConfig, RequestOptions, RestClientConfig } from './types.js';

/** Matches endpoints that already carry a scheme. */
const ABSOLUTE_URL = /^[a-z][a-z\d+\-.]*:/i;

/**
 * REST client that holds shared configuration and exposes one helper per HTTP verb.
 *
 * - `get`/`post`/`put`/`patch`/`delete` perform a single typed call.
 * - `getAsync`/`postAsync`/`putAsync`/`patchAsync`/`deleteAsync` return a lazy single with
 *   exponential-backoff retry.
 *
 * All synchronous helpers return error-first tuples via {@link SafeWrapAsync}.
 *
 * @example
 * const client = new RestClient({ baseUrl: 'https://api.example.com/v1' });
 * const [err, envelope] = await client.get('/users/1', { response: userSchema });
 */
export class RestClient {
  /** Client every call goes through. */
  #httpClient: HttpClient;
  /** Prefix for relative endpoints. */
  #baseUrl: string;
  /** Default headers applied to every request (merged with per-call headers). */
  #headers: Headers;
  /** Default deadline in milliseconds. */
  #deadline: number | false;
  /** Default retry settings for reactive calls. */
  #backoff: BackoffConfig & { interval: number; maxRetries: number };
  /** Default status validator. */
  #statusValidator: StatusValidator;
  /** Default response body limit. */
  #bodyLimit?: number;
  /** Logger handed to every call. */
  #logger: Logger;
  /** Global abort-controller for disposing */
  #abortController: AbortController;

  /**
   * Creates a client. Everything not given falls back to its default.
   */
  constructor({
    httpClient = createHttpClient(),
    baseUrl = '',
    headers,
    deadline = 15_000,
    backoff,
    statusValidator = isInvalidStatus,
    bodyLimit,
    logger = silentLogger,
  }: RestClientConfig = {}) {
    this.#httpClient = httpClient;
    this.#baseUrl = baseUrl;
    this.#headers = mergeHeaderOptions({ Accept: 'application/json' }, headers);
    this.#deadline = deadline;
    this.#backoff = { interval: 500, maxRetries: 2, ...backoff };
    this.#statusValidator = statusValidator;
    this.#bodyLimit = bodyLimit;
    this.#logger = logger;
    this.#abortController = new AbortController();
  }

  /**
   * Updates defaults at runtime. Headers are merged into the current set; a `null` header value removes it.
   */
  config(opts: RestClientConfig) {
    const { httpClient, baseUrl, headers, deadline, backoff, statusValidator, bodyLimit, logger } = opts;

    if (httpClient !== undefined) {
      this.#httpClient = httpClient;
    }

    if (baseUrl !== undefined) {
      this.#baseUrl = baseUrl;
    }

    if (headers !== undefined) {
      this.#headers = mergeHeaderOptions(this.#headers, headers);
    }

    if (deadline !== undefined) {
      this.#deadline = deadline;
    }

    if (backoff !== undefined) {
      this.#backoff = { ...this.#backoff, ...backoff };
    }

    if (statusValidator !== undefined) {
      this.#statusValidator = statusValidator;
    }

    if (bodyLimit !== undefined) {
      this.#bodyLimit = bodyLimit;
    }

    if (logger !== undefined) {
      this.#logger = logger;
    }
  }

  /**
   * Aborts every call still in flight on this client. Calls made afterwards fail immediately.
   */
  dispose() {
    this.#abortController.abort(new AbortError('error client was disposed'));
  }

  /** Performs a typed GET request. */
  get<S extends StandardSchemaV1>(endpoint: string, opts: RequestOptions<S>): SafeWrapAsync<Error, EnvelopeOf<S>> {
    return this.#linked(opts.signal, (signal) =>
      fetchTyped({ ...this.#base(endpoint, opts), signal, method: 'GET' }),
    );
  }

  /** Performs a typed POST request with `request` as its body. */
  post<S extends StandardSchemaV1>(
    endpoint: string,
    request: unknown,
    opts: RequestOptions<S>,
  ): SafeWrapAsync<Error, EnvelopeOf<S>> {
    return this.#linked(opts.signal, (signal) =>
      fetchTyped({ ...this.#base(endpoint, opts), signal, method: 'POST', request }),
    );
  }

  /** Performs a typed PUT request with `request` as its body. */
  put<S extends StandardSchemaV1>(
    endpoint: string,
    request: unknown,
    opts: RequestOptions<S>,
  ): SafeWrapAsync<Error, EnvelopeOf<S>> {
    return this.#linked(opts.signal, (signal) =>
      fetchTyped({ ...this.#base(endpoint, opts), signal, method: 'PUT', request }),
    );
  }

  /** Performs a typed PATCH request with `request` as its body. */
  patch<S extends StandardSchemaV1>(
    endpoint: string,
    request: unknown,
    opts: RequestOptions<S>,
  ): SafeWrapAsync<Error, EnvelopeOf<S>> {
    return this.#linked(opts.signal, (signal) =>
      fetchTyped({ ...this.#base(endpoint, opts), signal, method: 'PATCH', request }),
    );
  }

  /** Performs a typed DELETE request. */
  delete<S extends StandardSchemaV1>(endpoint: string, opts: RequestOptions<S>): SafeWrapAsync<Error, EnvelopeOf<S>> {
    return this.#linked(opts.signal, (signal) =>
      fetchTyped({ ...this.#base(endpoint, opts), signal, method: 'DELETE' }),
    );
  }

  /** Lazy GET with backoff retry; runs when observed. */
  getAsync<S extends StandardSchemaV1>(endpoint: string, opts: AsyncRequestOptions<S>): Single<EnvelopeOf<S>> {
    return this.#bound(fetchAsync({ ...this.#base(endpoint, opts), ...this.#retry(opts), method: 'GET' }));
  }

  /** Lazy POST with backoff retry; runs when observed. */
  postAsync<S extends StandardSchemaV1>(
    endpoint: string,
    request: unknown,
    opts: AsyncRequestOptions<S>,
  ): Single<EnvelopeOf<S>> {
    return this.#bound(fetchAsync({ ...this.#base(endpoint, opts), ...this.#retry(opts), method: 'POST', request }));
  }

  /** Lazy PUT with backoff retry; runs when observed. */
  putAsync<S extends StandardSchemaV1>(
    endpoint: string,
    request: unknown,
    opts: AsyncRequestOptions<S>,
  ): Single<EnvelopeOf<S>> {
    return this.#bound(fetchAsync({ ...this.#base(endpoint, opts), ...this.#retry(opts), method: 'PUT', request }));
  }

  /** Lazy PATCH with backoff retry; runs when observed. */
  patchAsync<S extends StandardSchemaV1>(
    endpoint: string,
    request: unknown,
    opts: AsyncRequestOptions<S>,
  ): Single<EnvelopeOf<S>> {
    return this.#bound(fetchAsync({ ...this.#base(endpoint, opts), ...this.#retry(opts), method: 'PATCH', request }));
  }

  /** Lazy DELETE with backoff retry; runs when observed. */
  deleteAsync<S extends StandardSchemaV1>(endpoint: string, opts: AsyncRequestOptions<S>): Single<EnvelopeOf<S>> {
    return this.#bound(fetchAsync({ ...this.#base(endpoint, opts), ...this.#retry(opts), method: 'DELETE' }));
  }

  /** Joins a relative endpoint onto the base URL; absolute endpoints pass through. */
  #url(endpoint: string): string {
    if (!this.#baseUrl || ABSOLUTE_URL.test(endpoint)) {
      return endpoint;
    }

    return `${this.#baseUrl.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;
  }

  /** Resolves per-call options against the client's defaults. */
  #base<S extends StandardSchemaV1>(endpoint: string, opts: RequestOptions<S>): BaseFetchOptions<S> {
    return {
      client: this.#httpClient,
      url: this.#url(endpoint),
      headers: mergeHeaderOptions(this.#headers, opts.headers),
      deadline: opts.deadline ?? this.#deadline,
      signal: opts.signal,
      statusValidator: opts.statusValidator ?? this.#statusValidator,
      response: opts.response,
      bodyLimit: opts.bodyLimit ?? this.#bodyLimit,
      allowUnknownKeys: opts.allowUnknownKeys,
      logger: this.#logger,
    };
  }

  /**
   * Runs `fn` under the client's abort signal linked with `signal`. The link is dropped once
   * `fn` settles, so long-lived caller signals do not collect a listener per call.
   */
  async #linked<T>(signal: AbortSignal | undefined, fn: (signal: AbortSignal | undefined) => Promise<T>): Promise<T> {
    const link = linkSignals([this.#abortController.signal, signal]);
    try {
      return await fn(link.signal ?? undefined);
    } finally {
      link.release();
    }
  }

  /** Ties every subscription of `single` to the client's abort signal. */
  #bound<T>(single: Single<T>): Single<T> {
    return Single.create(async (emit, signal) => {
      emit(await this.#linked(signal, (linked) => single.observe(linked)));
    });
  }

  /** Resolves per-call retry settings against the client's defaults. */
  #retry<S extends StandardSchemaV1>(opts: AsyncRequestOptions<S>): RetryFetchOptions {
    const { interval, maxRetries, ...backoff } = { ...this.#backoff, ...opts.backoff };

    return {
      backoffInterval: interval,
      maxRetries,
      backoff,
      suppress: opts.suppress,
    };
  }
}
