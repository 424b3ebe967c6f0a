import type { StandardSchemaV1 } from '@standard-schema/spec';
import { BadRequestError } from '../error/badRequestError.js';
import { NilValueError } from '../error/nilValueError.js';
import type { FormEncodable } from '../types/request.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { type DecodeOptions, decodeJSON, encodeJSON } from './json.js';

/** A serialized request body and the content type it was encoded with. */
export interface EncodedBody {
  body: string | URLSearchParams;
  contentType: 'application/json' | 'application/x-www-form-urlencoded';
}

/**
 * Type guard for request values that opt into a URL-encoded body.
 */
export function isFormEncodable(value: unknown): value is FormEncodable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toURLSearchParams' in value &&
    typeof value.toURLSearchParams === 'function'
  );
}

/**
 * Serializes a request value into a body.
 *
 * - `undefined` means "no request": `[null, null]`, nothing is sent.
 * - `null` is a request that should have been there → {@link NilValueError}.
 * - `URLSearchParams` and {@link FormEncodable} values are sent form-encoded.
 * - Anything else is JSON-encoded.
 */
export function encodeRequestBody(request: unknown): SafeWrap<Error, EncodedBody | null> {
  if (request === undefined) {
    return [null, null];
  }

  if (request === null) {
    return [new NilValueError('error nil request provided'), null];
  }

  if (request instanceof URLSearchParams) {
    return [null, { body: request, contentType: 'application/x-www-form-urlencoded' }];
  }

  if (isFormEncodable(request)) {
    return [null, { body: request.toURLSearchParams(), contentType: 'application/x-www-form-urlencoded' }];
  }

  const [err, json] = encodeJSON(request);
  if (err) {
    return [err, null];
  }

  return [null, { body: json, contentType: 'application/json' }];
}

/**
 * Server-side counterpart of the client codec: strictly decodes an incoming request body.
 *
 * - missing request → {@link NilValueError}
 * - unreadable body or any decode failure → {@link BadRequestError}, with the decode error as `cause`
 */
export async function readRequestBody<S extends StandardSchemaV1>(
  request: Request | null | undefined,
  schema: S,
  opts?: DecodeOptions,
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<S>> {
  if (!request) {
    return [new NilValueError('error nil request provided'), null];
  }

  const [errText, text] = await safeWrapAsync(() => request.text());
  if (errText) {
    return [new BadRequestError('error reading request body', { cause: errText }), null];
  }

  const [errDecode, value] = await decodeJSON(text, schema, opts);
  if (errDecode) {
    return [new BadRequestError('error decoding request body', { cause: errDecode }), null];
  }

  return [null, value];
}
