import type { HeaderOptions, HttpClient } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import { safeWrapAsync } from '../utils/wrap.js';
import { defaultTransport } from './client.js';
import { appendHeaders } from './utils.js';

/**
 * Round-tripper that appends a fixed set of headers to every request before handing it on.
 * Headers the request already carries are kept; a repeated key ends up with both values.
 */
export function withHeaders(headers: HeaderOptions, next: HttpClient = defaultTransport): HttpClient {
  return (request) => {
    const copy = new Request(request);
    appendHeaders(copy.headers, headers);
    return next(copy);
  };
}

/**
 * Round-tripper that logs each request and its outcome.
 */
export function withLogging(logger: Logger, next: HttpClient = defaultTransport): HttpClient {
  return async (request) => {
    logger.info({ method: request.method, url: request.url }, 'sending request');

    const [err, response] = await safeWrapAsync(() => next(request));
    if (err) {
      logger.error({ method: request.method, url: request.url, err }, 'request failed');
      throw err;
    }

    logger.info({ method: request.method, url: request.url, status: response.status }, 'received response');
    return response;
  };
}
