import type { StandardSchemaV1 } from '@standard-schema/spec';
import { encodeRequestBody } from '../codec/body.js';
import { type DecodeOptions, decodeJSON, noResponse } from '../codec/json.js';
import { BodyTooLargeError } from '../error/decodeError.js';
import { type CallScope, dispatch, timeoutOr, withDeadline } from '../fetch/call.js';
import { appendHeaders, releaseBody } from '../fetch/utils.js';
import type { BodylessMethod, BodyMethod, HeaderOptions, HttpClient, StatusValidator } from '../types/request.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import { abortable } from '../utils/signals.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { Envelope } from './envelope.js';

/** Options shared by every typed call, whatever the method. */
export interface BaseFetchOptions<S extends StandardSchemaV1> {
  /** Configured client that performs the round trip. */
  client: HttpClient;
  /** Absolute target URL. */
  url: string;
  /** Headers sent as given, plus `Content-Type` for an encoded body when none is set. */
  headers?: HeaderOptions;
  /** Milliseconds the whole call may take (dispatch, body read and decode), or `false` for none. */
  deadline: number | false;
  /** Caller's own cancellation. */
  signal?: AbortSignal;
  /**
   * Decides whether a response is a failure.
   * @default 4xx and 5xx are failures
   */
  statusValidator?: StatusValidator;
  /** Schema the response body is strictly decoded with, or {@link noResponse}. */
  response: S;
  /** Maximum response body size in bytes. */
  bodyLimit?: number;
  /**
   * Accept response keys the schema drops from its output.
   * @default false
   */
  allowUnknownKeys?: boolean;
  /** Receives a debug line per call. */
  logger?: Logger;
}

/**
 * Options for {@link fetchTyped}. Only POST, PUT and PATCH take a request value.
 */
export type FetchOptions<S extends StandardSchemaV1> = BaseFetchOptions<S> &
  (
    | {
        method: BodyMethod;
        /**
         * Request value. `undefined` sends no body, `null` is rejected as a nil value,
         * form-encodable values go URL-encoded, anything else as JSON.
         */
        request?: unknown;
      }
    | {
        method: BodylessMethod;
        request?: never;
      }
  );

/** Decoded envelope type produced for a response schema. */
export type EnvelopeOf<S extends StandardSchemaV1> = Envelope<StandardSchemaV1.InferOutput<S>>;

/** Releases a response body nobody will read; a failure to do so is only logged. */
export async function releaseResponse(response: Response, logger: Logger): Promise<void> {
  const [err] = await releaseBody(response);
  if (err) {
    logger.debug({ url: response.url, err }, 'failed to release response body');
  }
}

async function cancelReader(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  reason: unknown,
  url: string,
  logger: Logger,
): Promise<void> {
  const [err] = await safeWrapAsync(() => reader.cancel(reason));
  if (err) {
    logger.debug({ url, err }, 'failed to cancel response body');
  }
}

/**
 * Reads the body as UTF-8 text. With a `limit`, the body is streamed and cancelled as soon as
 * more than `limit` bytes have arrived, so an oversized reply is never held in full.
 */
async function readText(
  response: Response,
  limit: number | undefined,
  signal: AbortSignal,
  logger: Logger,
): SafeWrapAsync<Error, string> {
  const { body } = response;
  if (limit === undefined || !body) {
    return safeWrapAsync(() => abortable(response.text(), signal));
  }

  const reader = body.getReader();
  const decoder = new TextDecoder();
  let size = 0;
  let text = '';
  while (true) {
    const [errRead, chunk] = await safeWrapAsync(() => abortable(reader.read(), signal));
    if (errRead) {
      await cancelReader(reader, errRead, response.url, logger);
      return [errRead, null];
    }

    if (chunk.done) {
      return [null, text + decoder.decode()];
    }

    size += chunk.value.byteLength;
    if (size > limit) {
      await cancelReader(reader, undefined, response.url, logger);
      return [new BodyTooLargeError(limit), null];
    }

    text += decoder.decode(chunk.value, { stream: true });
  }
}

/**
 * Reads and decodes a response inside the call's scope. The body is consumed or released on every path.
 */
async function receive<S extends StandardSchemaV1>(
  response: Response,
  schema: S,
  decodeOpts: DecodeOptions,
  scope: CallScope,
  url: string,
  logger: Logger,
): SafeWrapAsync<Error, EnvelopeOf<S>> {
  if (response.status === 204 || schema === noResponse) {
    await releaseResponse(response, logger);
    return [null, new Envelope<StandardSchemaV1.InferOutput<S>>(null, response)];
  }

  const [errRead, text] = await readText(response, decodeOpts.limit, scope.signal, logger);
  if (errRead) {
    await releaseResponse(response, logger);
    return [timeoutOr(errRead, scope, url), null];
  }

  const [errDecode, body] = await decodeJSON(text, schema, decodeOpts);
  if (errDecode) {
    return [errDecode, null];
  }

  return [null, new Envelope(body, response)];
}

/**
 * Performs one typed HTTP call.
 *
 * 1. Encodes the request value, if any.
 * 2. Dispatches through {@link dispatch}, applying the status validator.
 * 3. A 204 reply, or a call without a response schema, yields an envelope with a `null` body.
 * 4. Otherwise reads the whole body, stopping early past `bodyLimit`, and strictly decodes it with the
 *    response schema.
 *
 * The deadline covers all of it. Every error is returned unchanged from the layer that produced it.
 *
 * @example
 * const [err, envelope] = await fetchTyped({
 *   client: createHttpClient(),
 *   method: 'POST',
 *   url: 'https://api.example.com/users',
 *   request: { name: 'Ada' },
 *   response: userSchema,
 *   deadline: 1_000,
 * });
 */
export async function fetchTyped<S extends StandardSchemaV1>(opts: FetchOptions<S>): SafeWrapAsync<Error, EnvelopeOf<S>> {
  const {
    client,
    url,
    method,
    request,
    headers,
    deadline,
    signal,
    statusValidator,
    response: schema,
    bodyLimit,
    allowUnknownKeys,
    logger = silentLogger,
  } = opts;

  const [errEncode, encoded] = encodeRequestBody(request);
  if (errEncode) {
    logger.debug({ method, url, err: errEncode }, 'request failed');
    return [errEncode, null];
  }

  const requestHeaders = appendHeaders(new Headers(), headers);
  if (encoded && !requestHeaders.has('content-type')) {
    requestHeaders.set('Content-Type', encoded.contentType);
  }

  const [err, envelope] = await withDeadline(
    deadline,
    url,
    signal,
    async (scope): Promise<SafeWrap<Error, EnvelopeOf<S>>> => {
      const [errCall, response] = await dispatch(
        { client, url, method, headers: requestHeaders, body: encoded?.body, statusValidator },
        scope,
      );
      if (errCall) {
        return [errCall, null];
      }

      return receive(response, schema, { limit: bodyLimit, allowUnknownKeys }, scope, url, logger);
    },
  );
  if (err) {
    logger.debug({ method, url, err }, 'request failed');
    return [err, null];
  }

  logger.debug({ method, url, status: envelope.status }, 'request completed');
  return [null, envelope];
}
