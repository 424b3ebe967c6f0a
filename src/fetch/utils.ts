import type { HeaderOptions, StatusValidator } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge global and local headers into a single `Headers` instance, normalizing keys.
 * Local values replace global ones; a `null` local value removes the header.
 */
export function mergeHeaderOptions(globalHeaders?: HeaderOptions, localHeaders?: HeaderOptions): Headers {
  const merged = new Headers();

  for (const [key, value] of [...toEntries(globalHeaders), ...toEntries(localHeaders)]) {
    if (value == null) {
      merged.delete(key);
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged.set(key, clean);
    }
  }

  return merged;
}

/**
 * Appends every header onto `target`. Existing values for the same key are kept,
 * so a repeated key ends up with both values.
 */
export function appendHeaders(target: Headers, headers?: HeaderOptions): Headers {
  for (const [key, value] of toEntries(headers)) {
    const clean = value == null ? null : sanitize(value);
    if (clean !== null) {
      target.append(key, clean);
    }
  }

  return target;
}

/**
 * Default status validator: every 4xx and 5xx response is a failure.
 */
export const isInvalidStatus: StatusValidator = (response) => response.status >= 400 && response.status <= 599;

/**
 * Cancels a response body nobody is going to read, so the connection can be reused.
 * A body that was already read, is being read, or does not exist is left alone.
 */
export async function releaseBody(response: Response): SafeWrapAsync<Error, void> {
  const body = response.body;
  if (!body || response.bodyUsed || body.locked) {
    return [null, undefined];
  }

  return safeWrapAsync(() => body.cancel());
}
