/**
 * Root entrypoint: re-exports the client, codec, streams, transport helpers and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';
export * from './codec/index.js';
export * from './error/index.js';
export * from './fetch/index.js';
export * from './stream/index.js';

/** Request-side types shared across the client. */
export type {
  BodylessMethod,
  BodyMethod,
  FormEncodable,
  HeaderOptions,
  HttpClient,
  HttpMethod,
  StatusValidator,
} from './types/request.js';

/** Exponential backoff policy used by the reactive calls. */
export { ExponentialBackoff } from './utils/backoff.js';
export type { ExponentialBackoffOptions } from './utils/backoff.js';

/** pino-backed logging. */
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LoggerOptions } from './utils/logger.js';

/** Tuple-style results. */
export { safeWrap, safeWrapAsync } from './utils/wrap.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
