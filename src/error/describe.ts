import type { StandardSchemaV1 } from '@standard-schema/spec';
import { decodeJSON, encodeJSON } from '../codec/json.js';
import { getInvalidStatusError } from './invalidStatusError.js';

/** Structured description of a failed response. */
export interface ErrorDescription {
  readonly statusCode: number;
  readonly status: string;
  readonly errorMessage: string;
}

/** Wire form the description is round-tripped through. */
interface WireDescription {
  status_code: number;
  status: string;
  error_message: string;
}

const EMPTY: ErrorDescription = Object.freeze({ statusCode: 0, status: '', errorMessage: '' });

function isWireDescription(value: unknown): value is WireDescription {
  return (
    typeof value === 'object' &&
    value !== null &&
    'status_code' in value &&
    typeof value.status_code === 'number' &&
    'status' in value &&
    typeof value.status === 'string' &&
    'error_message' in value &&
    typeof value.error_message === 'string'
  );
}

const wireDescription: StandardSchemaV1<unknown, WireDescription> = {
  '~standard': {
    version: 1,
    vendor: 'typedrest',
    validate: (value) =>
      isWireDescription(value)
        ? {
            value: {
              status_code: value.status_code,
              status: value.status,
              error_message: value.error_message,
            },
          }
        : { issues: [{ message: 'error invalid error description' }] },
  },
};

/**
 * Best-effort description of an invalid-status failure, for logs and telemetry.
 *
 * Reads the captured body (once), then encodes and strictly decodes the description as an
 * integrity check. Anything that is not an invalid-status error, and any failure on the way,
 * yields the empty description `{ statusCode: 0, status: '', errorMessage: '' }`.
 */
export async function describeError(err: unknown): Promise<ErrorDescription> {
  const invalid = getInvalidStatusError(err);
  if (!invalid) {
    return EMPTY;
  }

  const { response } = invalid;
  const text = await invalid.readBody();
  const wire: WireDescription = {
    status_code: response.status,
    status: response.statusText ? `${response.status} ${response.statusText}` : String(response.status),
    error_message: text,
  };

  const [errEncode, json] = encodeJSON(wire);
  if (errEncode) {
    return EMPTY;
  }

  const [errDecode, decoded] = await decodeJSON(json, wireDescription);
  if (errDecode) {
    return EMPTY;
  }

  return {
    statusCode: decoded.status_code,
    status: decoded.status,
    errorMessage: decoded.error_message,
  };
}
