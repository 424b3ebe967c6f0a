import type { StandardSchemaV1 } from '@standard-schema/spec';
import {
  BodyTooLargeError,
  EmptyBodyError,
  MalformedJSONError,
  MultipleJSONValuesError,
  UnknownKeyError,
  WrongJSONTypeError,
} from '../error/decodeError.js';
import { MarshalError } from '../error/marshalError.js';
import { NilValueError } from '../error/nilValueError.js';
import { getValidationError } from '../error/validationError.js';
import { isStandardSchema, validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';

/** Options for {@link decodeJSON}. */
export interface DecodeOptions {
  /** Maximum body size in bytes. Unlimited when omitted. */
  limit?: number;
  /**
   * Accept keys the schema drops from its output.
   * Only needed for schemas that transform objects into differently-keyed objects.
   * @default false
   */
  allowUnknownKeys?: boolean;
}

/**
 * Response marker for endpoints whose reply carries no body worth decoding.
 * Typed fetch drains the body and leaves the envelope body `null`.
 */
export const noResponse: StandardSchemaV1<unknown, null> = {
  '~standard': {
    version: 1,
    vendor: 'typedrest',
    validate: () => ({ value: null }),
  },
};

/** Result of locating the end of the first JSON value. */
type Scan = { kind: 'empty' } | { kind: 'eof' } | { kind: 'value'; start: number; end: number };

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);
const DELIMITERS = new Set(['{', '}', '[', ']', '"', ',', ':']);

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && WHITESPACE.has(text[i])) {
    i += 1;
  }

  return i;
}

/**
 * Finds where the first top-level JSON value ends without parsing it, so a trailing
 * second value can be told apart from a syntax error inside the first one.
 */
function scanFirstValue(text: string): Scan {
  const start = skipWhitespace(text, 0);
  if (start === text.length) {
    return { kind: 'empty' };
  }

  const first = text[start];
  if (first === '{' || first === '[') {
    let depth = 0;
    let inString = false;
    for (let i = start; i < text.length; i += 1) {
      const ch = text[i];
      if (inString) {
        if (ch === '\\') {
          i += 1;
        } else if (ch === '"') {
          inString = false;
        }
        continue;
      }

      if (ch === '"') {
        inString = true;
      } else if (ch === '{' || ch === '[') {
        depth += 1;
      } else if (ch === '}' || ch === ']') {
        depth -= 1;
        if (depth === 0) {
          return { kind: 'value', start, end: i + 1 };
        }
      }
    }

    return { kind: 'eof' };
  }

  if (first === '"') {
    for (let i = start + 1; i < text.length; i += 1) {
      if (text[i] === '\\') {
        i += 1;
      } else if (text[i] === '"') {
        return { kind: 'value', start, end: i + 1 };
      }
    }

    return { kind: 'eof' };
  }

  let end = start;
  while (end < text.length && !WHITESPACE.has(text[end]) && !DELIMITERS.has(text[end])) {
    end += 1;
  }

  // A stray closing bracket or comma is still one (invalid) token
  return { kind: 'value', start, end: Math.max(end, start + 1) };
}

/** Outcome of reading one grammar element: where it ended, or where it went wrong. */
type Step = { ok: true; next: number } | { ok: false; at: number };

const LITERALS = ['true', 'false', 'null'];
const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const ESCAPES = new Set(['"', '\\', '/', 'b', 'f', 'n', 'r', 't']);
const HEX4 = /[0-9a-fA-F]{4}/y;

function fail(at: number): Step {
  return { ok: false, at };
}

function readString(text: string, from: number): Step {
  for (let i = from + 1; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === '"') {
      return { ok: true, next: i + 1 };
    }

    if (ch < ' ') {
      return fail(i);
    }

    if (ch === '\\') {
      const escape = text[i + 1];
      if (escape === 'u') {
        HEX4.lastIndex = i + 2;
        if (!HEX4.test(text)) {
          return fail(i + 2);
        }

        i += 5;
      } else if (ESCAPES.has(escape)) {
        i += 1;
      } else {
        return fail(i + 1);
      }
    }
  }

  return fail(text.length);
}

function readContainer(text: string, from: number, close: '}' | ']'): Step {
  let i = skipWhitespace(text, from + 1);
  if (text[i] === close) {
    return { ok: true, next: i + 1 };
  }

  while (true) {
    if (close === '}') {
      if (text[i] !== '"') {
        return fail(i);
      }

      const key = readString(text, i);
      if (!key.ok) {
        return key;
      }

      i = skipWhitespace(text, key.next);
      if (text[i] !== ':') {
        return fail(i);
      }

      i += 1;
    }

    const value = readValue(text, i);
    if (!value.ok) {
      return value;
    }

    i = skipWhitespace(text, value.next);
    if (text[i] === close) {
      return { ok: true, next: i + 1 };
    }

    if (text[i] !== ',') {
      return fail(i);
    }

    i = skipWhitespace(text, i + 1);
  }
}

function readValue(text: string, from: number): Step {
  const i = skipWhitespace(text, from);
  const ch = text[i];
  if (ch === '{') {
    return readContainer(text, i, '}');
  }

  if (ch === '[') {
    return readContainer(text, i, ']');
  }

  if (ch === '"') {
    return readString(text, i);
  }

  const literal = LITERALS.find((word) => text.startsWith(word, i));
  if (literal) {
    return { ok: true, next: i + literal.length };
  }

  NUMBER.lastIndex = i;
  const number = NUMBER.exec(text);
  if (number) {
    return { ok: true, next: i + number[0].length };
  }

  return fail(i);
}

/**
 * Byte offset of the first character that breaks the JSON grammar in `text[start, end)`.
 * A value that reads cleanly but stops short of `end` is faulted where it stops.
 */
function syntaxOffset(text: string, start: number, end: number): number {
  const value = text.slice(0, end);
  const step = readValue(value, start);
  const at = step.ok ? step.next : step.at;

  return new TextEncoder().encode(value.slice(0, at)).byteLength;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }

  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function joinPath(parent: string, key: PropertyKey): string {
  return parent ? `${parent}.${String(key)}` : String(key);
}

/**
 * Walks the parsed input alongside the schema output and reports the first key the schema dropped.
 * Only plain objects and arrays are compared; anything the schema turned into another shape is skipped.
 */
function findDroppedKey(input: unknown, output: unknown, path = ''): string | null {
  if (Array.isArray(input) && Array.isArray(output) && input.length === output.length) {
    for (let i = 0; i < input.length; i += 1) {
      const dropped = findDroppedKey(input[i], output[i], joinPath(path, i));
      if (dropped) {
        return dropped;
      }
    }

    return null;
  }

  if (!isPlainObject(input) || !isPlainObject(output)) {
    return null;
  }

  for (const key of Object.keys(input)) {
    if (!Object.hasOwn(output, key)) {
      return joinPath(path, key);
    }

    const dropped = findDroppedKey(input[key], output[key], joinPath(path, key));
    if (dropped) {
      return dropped;
    }
  }

  return null;
}

function issuePath(issue: StandardSchemaV1.Issue): string {
  let path = '';
  for (const segment of issue.path ?? []) {
    path = joinPath(path, typeof segment === 'object' ? segment.key : segment);
  }

  return path;
}

/**
 * Maps a schema issue onto the decode taxonomy. Schemas that report undeclared keys
 * (zod's `unrecognized_keys`) become {@link UnknownKeyError}, everything else a type mismatch.
 */
function classifyIssue(issue: StandardSchemaV1.Issue, cause: Error): Error {
  const path = issuePath(issue);

  if ('code' in issue && issue.code === 'unrecognized_keys' && 'keys' in issue && Array.isArray(issue.keys)) {
    const [key] = issue.keys;
    return new UnknownKeyError(joinPath(path, String(key)), { cause });
  }

  return new WrongJSONTypeError(path, { cause });
}

/**
 * Strictly decodes a JSON body into the schema's output type.
 *
 * Checked in order:
 * 1. size above `limit` → {@link BodyTooLargeError}
 * 2. whitespace only → {@link EmptyBodyError}
 * 3. truncated value or syntax error → {@link MalformedJSONError}, with the byte offset of a syntax error
 * 4. schema rejects the value → {@link UnknownKeyError} or {@link WrongJSONTypeError}
 * 5. schema drops a key present in the body → {@link UnknownKeyError}
 * 6. anything but whitespace after the value → {@link MultipleJSONValuesError}
 *
 * A schema that throws surfaces as its `ValidationError` untouched.
 *
 * @throws TypeError when `schema` is not a Standard Schema. That is a caller bug, not bad input.
 */
export async function decodeJSON<S extends StandardSchemaV1>(
  text: string,
  schema: S,
  opts: DecodeOptions = {},
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<S>> {
  if (!isStandardSchema(schema)) {
    throw new TypeError('decodeJSON requires a Standard Schema as destination');
  }

  const { limit, allowUnknownKeys = false } = opts;
  if (limit !== undefined && new TextEncoder().encode(text).byteLength > limit) {
    return [new BodyTooLargeError(limit), null];
  }

  const scan = scanFirstValue(text);
  if (scan.kind === 'empty') {
    return [new EmptyBodyError(), null];
  }

  if (scan.kind === 'eof') {
    return [new MalformedJSONError(), null];
  }

  const [errParse, parsed] = safeWrap<unknown>(() => JSON.parse(text.slice(scan.start, scan.end)));
  if (errParse) {
    return [new MalformedJSONError(syntaxOffset(text, scan.start, scan.end), { cause: errParse }), null];
  }

  const [errValidate, value] = await validator(parsed, schema);
  if (errValidate) {
    const [issue] = getValidationError(errValidate)?.issues ?? [];
    if (!issue) {
      return [errValidate, null];
    }

    return [classifyIssue(issue, errValidate), null];
  }

  if (!allowUnknownKeys) {
    const dropped = findDroppedKey(parsed, value);
    if (dropped) {
      return [new UnknownKeyError(dropped), null];
    }
  }

  if (skipWhitespace(text, scan.end) !== text.length) {
    return [new MultipleJSONValuesError(), null];
  }

  return [null, value];
}

/**
 * Serializes a value to JSON text.
 *
 * - `null` / `undefined` → {@link NilValueError}
 * - serializer failure (cycles, BigInt, a throwing `toJSON`) or a value with no JSON form
 *   → {@link MarshalError} carrying the serializer's message
 */
export function encodeJSON(value: unknown): SafeWrap<Error, string> {
  if (value === null || value === undefined) {
    return [new NilValueError('error nil value provided'), null];
  }

  const [err, text] = safeWrap(() => JSON.stringify(value));
  if (err) {
    return [new MarshalError(`error failed to marshal the value to JSON: "${err.message}"`, { cause: err }), null];
  }

  if (text === undefined) {
    return [new MarshalError(`error failed to marshal the value to JSON: "${typeof value} has no JSON form"`), null];
  }

  return [null, text];
}
