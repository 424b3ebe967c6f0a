import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import z from 'zod';
import {
  BodyTooLargeError,
  EmptyBodyError,
  getDecodeError,
  MalformedJSONError,
  MultipleJSONValuesError,
  UnknownKeyError,
  WrongJSONTypeError,
} from '../error/decodeError.js';
import { isErrorType } from '../error/isErrorType.js';
import { isMarshalError } from '../error/marshalError.js';
import { isNilValueError } from '../error/nilValueError.js';
import { isValidationError } from '../error/validationError.js';
import { decodeJSON, encodeJSON, noResponse } from './json.js';

const user = z.object({ name: z.string() });

describe('decodeJSON', () => {
  it('decodes a single value surrounded by whitespace', async () => {
    const [err, value] = await decodeJSON('  {"name":"Marco"}  \n', user);

    expect(err).toBeNull();
    expect(value).toEqual({ name: 'Marco' });
  });

  it('decodes scalars', async () => {
    const [err, value] = await decodeJSON('"hello"', z.string());

    expect(err).toBeNull();
    expect(value).toBe('hello');
  });

  it('rejects a truncated body as malformed', async () => {
    const [err, value] = await decodeJSON('{"name": "Marco"', user);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(MalformedJSONError);
    expect(getDecodeError(err)).toBe(err);
  });

  it('rejects an unterminated string as malformed', async () => {
    const [err] = await decodeJSON('{"a":"}', user);

    expect(err).toBeInstanceOf(MalformedJSONError);
  });

  it('rejects a syntax error as malformed, keeping the parser error as cause', async () => {
    const [err] = await decodeJSON('{"name": nope}', user);

    expect(err).toBeInstanceOf(MalformedJSONError);
    expect(err?.cause).toBeInstanceOf(SyntaxError);
  });

  it('points at the offending byte of a syntax error', async () => {
    const offsetOf = async (text: string) => {
      const [err] = await decodeJSON(text, z.unknown());
      return err instanceof MalformedJSONError ? err.offset : undefined;
    };

    await expect(offsetOf('{"name": nope}')).resolves.toBe(9);
    await expect(offsetOf('{"a":}')).resolves.toBe(5);
    await expect(offsetOf('[1,,2]')).resolves.toBe(3);
    await expect(offsetOf('{"a" 1}')).resolves.toBe(5);
    await expect(offsetOf('{"name":"x",}')).resolves.toBe(12);
    await expect(offsetOf('  01')).resolves.toBe(3);
  });

  it('counts the offset in bytes, not characters', async () => {
    const [err] = await decodeJSON('{"név": nope}', z.unknown());

    expect(err).toBeInstanceOf(MalformedJSONError);
    expect(err?.message).toBe('error badly-formed JSON in the body at byte 9');
  });

  it('points at a bad escape inside a string', async () => {
    const [err] = await decodeJSON('["a\\qb"]', z.unknown());

    expect(err instanceof MalformedJSONError && err.offset).toBe(4);
  });

  it('rejects an empty body', async () => {
    const [errEmpty] = await decodeJSON('', user);
    const [errBlank] = await decodeJSON(' \n\t', user);

    expect(errEmpty).toBeInstanceOf(EmptyBodyError);
    expect(errBlank).toBeInstanceOf(EmptyBodyError);
  });

  it('rejects a key the schema does not declare', async () => {
    const [err, value] = await decodeJSON('{"name":"Marco","extra":1}', user);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(UnknownKeyError);
    expect(isErrorType(UnknownKeyError, err) && err.key).toBe('extra');
  });

  it('reports undeclared keys from strict schemas by name', async () => {
    const [err] = await decodeJSON('{"name":"Marco","extra":1}', user.strict());

    expect(err).toBeInstanceOf(UnknownKeyError);
    expect(err?.message).toBe('error unknown key in the body "extra"');
  });

  it('reports the path of an undeclared key inside arrays', async () => {
    const [err] = await decodeJSON('[{"id":1},{"id":2,"x":true}]', z.array(z.object({ id: z.number() })));

    expect(err?.message).toBe('error unknown key in the body "1.x"');
  });

  it('accepts dropped keys when asked to', async () => {
    const [err, value] = await decodeJSON('{"name":"Marco","extra":1}', user, { allowUnknownKeys: true });

    expect(err).toBeNull();
    expect(value).toEqual({ name: 'Marco' });
  });

  it('does not compare outputs the schema reshaped', async () => {
    const length = z.object({ name: z.string() }).transform((v) => v.name.length);

    const [err, value] = await decodeJSON('{"name":"Marco"}', length);

    expect(err).toBeNull();
    expect(value).toBe(5);
  });

  it('reports a type mismatch with the field path', async () => {
    const nested = z.object({ user: z.object({ age: z.number() }) });

    const [err] = await decodeJSON('{"user":{"age":"old"}}', nested);

    expect(err).toBeInstanceOf(WrongJSONTypeError);
    expect(err?.message).toBe('error incorrect JSON type in the body for field "user.age"');
  });

  it('reports a top-level type mismatch without a field', async () => {
    const [err] = await decodeJSON('"Marco"', user);

    expect(err).toBeInstanceOf(WrongJSONTypeError);
    expect(err?.message).toBe('error incorrect JSON type in the body');
  });

  it('rejects a second value after the first', async () => {
    const [errObjects] = await decodeJSON('{"name":"a"}{"name":"b"}', user);
    const [errNumbers] = await decodeJSON('42 43', z.number());

    expect(errObjects).toBeInstanceOf(MultipleJSONValuesError);
    expect(errNumbers).toBeInstanceOf(MultipleJSONValuesError);
  });

  it('rejects a body above the limit before parsing it', async () => {
    const [err] = await decodeJSON('{"name":"Marco"}', user, { limit: 10 });

    expect(err).toBeInstanceOf(BodyTooLargeError);
    expect(err?.message).toBe('error body size limit exceeded, max size is 10 bytes');
  });

  it('counts the limit in bytes, not characters', async () => {
    const [errOver] = await decodeJSON('"ææ"', z.string(), { limit: 5 });
    const [errAt, value] = await decodeJSON('"ææ"', z.string(), { limit: 6 });

    expect(errOver).toBeInstanceOf(BodyTooLargeError);
    expect(errAt).toBeNull();
    expect(value).toBe('ææ');
  });

  it('surfaces a schema that throws as a validation error', async () => {
    const broken: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: () => {
          throw new Error('schema bug');
        },
      },
    };

    const [err] = await decodeJSON('"x"', broken);

    expect(isValidationError(err)).toBe(true);
  });

  it('throws when the destination is not a schema', async () => {
    await expect(Reflect.apply(decodeJSON, undefined, ['{}', {}])).rejects.toThrow(TypeError);
  });

  it('decodes anything to null with the no-response marker', async () => {
    const [err, value] = await decodeJSON('{"ignored":true}', noResponse, { allowUnknownKeys: true });

    expect(err).toBeNull();
    expect(value).toBeNull();
  });
});

describe('encodeJSON', () => {
  it('encodes values to JSON text', () => {
    expect(encodeJSON({ name: 'Adam Smith', tags: ['a'] })).toEqual([null, '{"name":"Adam Smith","tags":["a"]}']);
  });

  it('rejects null and undefined as nil values', () => {
    const [errNull] = encodeJSON(null);
    const [errUndefined] = encodeJSON(undefined);

    expect(isNilValueError(errNull)).toBe(true);
    expect(errNull?.message).toBe('error nil value provided');
    expect(isNilValueError(errUndefined)).toBe(true);
  });

  it('wraps serializer failures with their message', () => {
    const [err, text] = encodeJSON({ big: 1n });

    expect(text).toBeNull();
    expect(isMarshalError(err)).toBe(true);
    expect(err?.message).toBe('error failed to marshal the value to JSON: "Do not know how to serialize a BigInt"');
    expect(err?.cause).toBeInstanceOf(TypeError);
  });

  it('rejects cycles', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    const [err] = encodeJSON(cyclic);

    expect(isMarshalError(err)).toBe(true);
    expect(err?.message.startsWith('error failed to marshal the value to JSON: "Converting circular structure')).toBe(true);
  });

  it('rejects values with no JSON form', () => {
    const [err] = encodeJSON(() => 1);

    expect(err?.message).toBe('error failed to marshal the value to JSON: "function has no JSON form"');
  });
});
