import { describe, expect, it } from 'vitest';
import z from 'zod';
import { isBadRequestError } from '../error/badRequestError.js';
import { UnknownKeyError } from '../error/decodeError.js';
import { isErrorType } from '../error/isErrorType.js';
import { isMarshalError } from '../error/marshalError.js';
import { isNilValueError } from '../error/nilValueError.js';
import type { FormEncodable } from '../types/request.js';
import { encodeRequestBody, isFormEncodable, readRequestBody } from './body.js';

class Login implements FormEncodable {
  constructor(
    readonly user: string,
    readonly password: string,
  ) {}

  toURLSearchParams(): URLSearchParams {
    return new URLSearchParams({ user: this.user, password: this.password });
  }
}

describe('encodeRequestBody', () => {
  it('sends nothing for an absent request', () => {
    expect(encodeRequestBody(undefined)).toEqual([null, null]);
  });

  it('rejects a null request as nil', () => {
    const [err, body] = encodeRequestBody(null);

    expect(body).toBeNull();
    expect(isNilValueError(err)).toBe(true);
    expect(err?.message).toBe('error nil request provided');
  });

  it('encodes plain values as JSON', () => {
    const [err, encoded] = encodeRequestBody({ name: 'Adam Smith', email: 'adam.smith@hotmail.com' });

    expect(err).toBeNull();
    expect(encoded).toEqual({
      body: '{"name":"Adam Smith","email":"adam.smith@hotmail.com"}',
      contentType: 'application/json',
    });
  });

  it('prefers the form encoding a request declares', () => {
    const [err, encoded] = encodeRequestBody(new Login('adam', 'test-secret'));

    expect(err).toBeNull();
    expect(encoded?.contentType).toBe('application/x-www-form-urlencoded');
    expect(String(encoded?.body)).toBe('user=adam&password=test-secret');
  });

  it('sends URLSearchParams as they are', () => {
    const params = new URLSearchParams({ q: 'a b' });

    const [, encoded] = encodeRequestBody(params);

    expect(encoded?.body).toBe(params);
    expect(encoded?.contentType).toBe('application/x-www-form-urlencoded');
  });

  it('passes marshal failures through', () => {
    const [err] = encodeRequestBody({ id: 1n });

    expect(isMarshalError(err)).toBe(true);
  });
});

describe('isFormEncodable', () => {
  it('requires a toURLSearchParams function', () => {
    expect(isFormEncodable(new Login('a', 'b'))).toBe(true);
    expect(isFormEncodable({ toURLSearchParams: 'no' })).toBe(false);
    expect(isFormEncodable(null)).toBe(false);
  });
});

describe('readRequestBody', () => {
  const schema = z.object({ name: z.string() });
  const post = (body: string) => new Request('http://svc.test/users', { method: 'POST', body });

  it('decodes a valid body', async () => {
    const [err, value] = await readRequestBody(post('{"name":"Ada"}'), schema);

    expect(err).toBeNull();
    expect(value).toEqual({ name: 'Ada' });
  });

  it('rejects a missing request as nil', async () => {
    const [err] = await readRequestBody(null, schema);

    expect(isNilValueError(err)).toBe(true);
  });

  it('wraps decode failures as bad requests, keeping the decode kind', async () => {
    const [err] = await readRequestBody(post('{"name":"Ada","admin":true}'), schema);

    expect(isBadRequestError(err)).toBe(true);
    expect(err?.message).toBe('error decoding request body');
    expect(isErrorType(UnknownKeyError, err)).toBe(true);
  });

  it('wraps an unreadable body as a bad request', async () => {
    const request = post('{"name":"Ada"}');
    await request.text();

    const [err] = await readRequestBody(request, schema);

    expect(isBadRequestError(err)).toBe(true);
    expect(err?.message).toBe('error reading request body');
  });
});
