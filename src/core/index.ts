/**
 * Core entrypoint: typed fetch, reactive fetch and the configured REST client.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/**
 * REST client holding shared defaults, with a helper per HTTP verb.
 */
export { RestClient } from './client.js';

/** Typed call result: decoded body plus raw response. */
export { Envelope, isEnvelope } from './envelope.js';

/** Single typed HTTP call. */
export { fetchTyped } from './fetch.js';
export type { BaseFetchOptions, EnvelopeOf, FetchOptions } from './fetch.js';

/** Typed HTTP call as a lazy single with backoff retry. */
export { fetchAsync } from './fetchAsync.js';
export type { FetchAsyncOptions, RetryFetchOptions } from './fetchAsync.js';

export type { AsyncRequestOptions, BackoffConfig, RequestOptions, RestClientConfig } from './types.js';
