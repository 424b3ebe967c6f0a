/**
 * Codec entrypoint: strict JSON decode/encode and request body helpers.
 * @module
 */
export { encodeRequestBody, isFormEncodable, readRequestBody } from './body.js';
export type { EncodedBody } from './body.js';
export { decodeJSON, encodeJSON, noResponse } from './json.js';
export type { DecodeOptions } from './json.js';
