/**
 * Fetch entrypoint: the deadline-bounded call primitive, client construction and round-trippers.
 * @module
 */
export { call, dispatch, timeoutOr, withDeadline } from './call.js';
export type { CallBody, CallOptions, CallScope } from './call.js';
export { createHttpClient, defaultTransport } from './client.js';
export type { HttpClientOptions } from './client.js';
export { withHeaders, withLogging } from './middleware.js';
export { maxRedirects, oneRedirect } from './policy.js';
export type { RedirectPolicy } from './policy.js';
export { isInvalidStatus, mergeHeaderOptions } from './utils.js';
