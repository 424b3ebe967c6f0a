import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { HeaderOptions, HttpClient, StatusValidator } from '../types/request.js';
import type { ExponentialBackoffOptions } from '../utils/backoff.js';
import type { Logger } from '../utils/logger.js';

/** Retry defaults for the reactive verbs, extends the exponential-backoff tuning. */
export interface BackoffConfig extends Omit<ExponentialBackoffOptions, 'initialInterval'> {
  /**
   * First backoff delay in milliseconds.
   * @default 500
   */
  interval?: number;
  /**
   * Retries after the first attempt.
   * @default 2
   */
  maxRetries?: number;
}

/** Defaults a {@link RestClient} applies to every call. All optional, all updatable via `config`. */
export interface RestClientConfig {
  /** Configured client used for every call. Defaults to `createHttpClient()`. */
  httpClient?: HttpClient;
  /** Prefix joined onto relative endpoints (e.g. `https://api.example.com/v1`). */
  baseUrl?: string;
  /** Headers sent with every call. A `null` value removes a previously configured header. */
  headers?: HeaderOptions;
  /**
   * Per-call deadline in milliseconds, or `false` for none.
   * @default 15_000
   */
  deadline?: number | false;
  /** Retry defaults for the `*Async` verbs. */
  backoff?: BackoffConfig;
  /**
   * Decides whether a response is a failure.
   * @default 4xx and 5xx are failures
   */
  statusValidator?: StatusValidator;
  /** Maximum response body size in bytes. */
  bodyLimit?: number;
  /** Logger for calls and retries. Silent by default. */
  logger?: Logger;
}

/** Per-call options for the verb helpers. Unset values fall back to the client's defaults. */
export interface RequestOptions<S extends StandardSchemaV1> {
  /** Schema the response body is decoded with, or `noResponse`. */
  response: S;
  /** Merged over the client's default headers. */
  headers?: HeaderOptions;
  deadline?: number | false;
  signal?: AbortSignal;
  statusValidator?: StatusValidator;
  bodyLimit?: number;
  /** Accept response keys the schema drops from its output. */
  allowUnknownKeys?: boolean;
}

/** Per-call options for the reactive verb helpers. */
export interface AsyncRequestOptions<S extends StandardSchemaV1> extends RequestOptions<S> {
  /** Merged over the client's retry defaults. */
  backoff?: BackoffConfig;
  /**
   * Return `true` to stop retrying on this error.
   * @default every error is retried
   */
  suppress?: (err: Error) => boolean;
}
