import { getEventListeners } from 'node:events';
import { Hono } from 'hono';
import { describe, expect, it } from 'vitest';
import z from 'zod';
import { noResponse } from '../codec/json.js';
import { isAbortError } from '../error/abortError.js';
import { BodyTooLargeError } from '../error/decodeError.js';
import { getInvalidStatusError } from '../error/invalidStatusError.js';
import { getRetryExhaustedError } from '../error/retryExhaustedError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { extract } from '../stream/item.js';
import type { HttpClient } from '../types/request.js';
import { sleep } from '../utils/sleep.js';
import { RestClient } from './client.js';

const headersSchema = z.object({ accept: z.string().nullable(), token: z.string().nullable() });
const echoSchema = z.object({ method: z.string(), body: z.string() });

function setup() {
  const counts: Record<string, number> = {};
  const app = new Hono();
  app.use(async (c, next) => {
    const key = `${c.req.method} ${new URL(c.req.url).pathname}`;
    counts[key] = (counts[key] ?? 0) + 1;
    await next();
  });
  app.get('/v1/whoami', (c) =>
    c.json({ accept: c.req.header('accept') ?? null, token: c.req.header('x-token') ?? null }),
  );
  app.on(['POST', 'PUT', 'PATCH'], '/v1/echo', async (c) => c.json({ method: c.req.method, body: await c.req.text() }));
  app.delete('/v1/items/1', (c) => c.body(null, 204));
  app.get('/v1/down', (c) => c.json({ error: 'down' }, 503));
  app.get('/v1/slow', async (c) => {
    await sleep(150);
    return c.json({ accept: null, token: null });
  });
  app.get('/other/whoami', (c) => c.json({ accept: 'other', token: null }));

  const httpClient: HttpClient = async (request) => app.fetch(request);
  return { counts, httpClient };
}

describe('RestClient', () => {
  it('joins endpoints onto the base url and sends default plus per-call headers', async () => {
    const { httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1/' });

    const [err, envelope] = await client.get('/whoami', { response: headersSchema, headers: { 'X-Token': 'test-token' } });

    expect(err).toBeNull();
    expect(envelope?.body).toEqual({ accept: 'application/json', token: 'test-token' });
  });

  it('leaves absolute endpoints alone', async () => {
    const { httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1' });

    const [, envelope] = await client.get('http://svc.test/other/whoami', { response: headersSchema });

    expect(envelope?.body).toEqual({ accept: 'other', token: null });
  });

  it('merges configured headers and removes the ones set to null', async () => {
    const { httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1', headers: { 'X-Token': 'first' } });

    client.config({ headers: { 'X-Token': 'second' } });
    const [, updated] = await client.get('whoami', { response: headersSchema });

    client.config({ headers: { 'X-Token': null, Accept: null } });
    const [, removed] = await client.get('whoami', { response: headersSchema });

    expect(updated?.body).toEqual({ accept: 'application/json', token: 'second' });
    expect(removed?.body).toEqual({ accept: null, token: null });
  });

  it('sends bodies with post, put and patch', async () => {
    const { httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1' });
    const opts = { response: echoSchema };

    const [, posted] = await client.post('/echo', { n: 1 }, opts);
    const [, put] = await client.put('/echo', { n: 2 }, opts);
    const [, patched] = await client.patch('/echo', { n: 3 }, opts);

    expect(posted?.body).toEqual({ method: 'POST', body: '{"n":1}' });
    expect(put?.body).toEqual({ method: 'PUT', body: '{"n":2}' });
    expect(patched?.body).toEqual({ method: 'PATCH', body: '{"n":3}' });
  });

  it('deletes without a response body', async () => {
    const { httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1' });

    const [err, envelope] = await client.delete('/items/1', { response: noResponse });

    expect(err).toBeNull();
    expect(envelope?.status).toBe(204);
    expect(envelope?.body).toBeNull();
  });

  it('applies the configured deadline and body limit', async () => {
    const { httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1' });
    client.config({ deadline: 20, bodyLimit: 10 });

    const [errSlow] = await client.get('/slow', { response: headersSchema });
    const [errLarge] = await client.get('/whoami', { response: headersSchema });
    const [errOverride] = await client.get('/whoami', { response: headersSchema, bodyLimit: 1_000 });

    expect(errSlow).toBeInstanceOf(TimeoutError);
    expect(errLarge).toBeInstanceOf(BodyTooLargeError);
    expect(errOverride).toBeNull();
  });

  it('retries reactive calls with the client backoff defaults', async () => {
    const { counts, httpClient } = setup();
    const client = new RestClient({
      httpClient,
      baseUrl: 'http://svc.test/v1',
      backoff: { interval: 1, randomizationFactor: 0 },
    });

    const single = client.getAsync('/down', { response: headersSchema });
    expect(counts['GET /v1/down']).toBeUndefined();

    const [err] = extract(await single.observe());

    expect(counts['GET /v1/down']).toBe(3);
    expect(getRetryExhaustedError(err)?.attempts).toBe(3);
    expect(getInvalidStatusError(err)?.status).toBe(503);
  });

  it('lets a call override the retry count', async () => {
    const { counts, httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1', backoff: { interval: 1 } });

    await client.getAsync('/down', { response: headersSchema, backoff: { maxRetries: 0 } }).observe();

    expect(counts['GET /v1/down']).toBe(1);
  });

  it('runs the reactive body verbs', async () => {
    const { httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1' });

    const [, posted] = extract(await client.postAsync('/echo', { n: 1 }, { response: echoSchema }).observe());
    const [, put] = extract(await client.putAsync('/echo', { n: 2 }, { response: echoSchema }).observe());
    const [, patched] = extract(await client.patchAsync('/echo', { n: 3 }, { response: echoSchema }).observe());
    const [, deleted] = extract(await client.deleteAsync('/items/1', { response: noResponse }).observe());

    expect(posted?.body).toEqual({ method: 'POST', body: '{"n":1}' });
    expect(put?.body).toEqual({ method: 'PUT', body: '{"n":2}' });
    expect(patched?.body).toEqual({ method: 'PATCH', body: '{"n":3}' });
    expect(deleted?.status).toBe(204);
  });

  it('aborts in-flight calls on dispose', async () => {
    const { httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1' });

    const pending = client.get('/slow', { response: headersSchema });
    client.dispose();
    const [err] = await pending;

    expect(isAbortError(err)).toBe(true);
    expect(err?.message).toBe('error client was disposed');
  });

  it('aborts reactive calls on dispose', async () => {
    const { httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1' });

    const pending = client.getAsync('/slow', { response: headersSchema, backoff: { maxRetries: 0 } }).observe();
    await sleep(10);
    client.dispose();
    const [err] = extract(await pending);

    expect(isAbortError(err)).toBe(true);
  });

  it('leaves no listeners behind on a long-lived caller signal', async () => {
    const { httpClient } = setup();
    const client = new RestClient({ httpClient, baseUrl: 'http://svc.test/v1' });
    const caller = new AbortController();

    for (let i = 0; i < 50; i += 1) {
      const [err] = await client.get('/whoami', { response: headersSchema, signal: caller.signal });
      expect(err).toBeNull();
    }

    const single = client.getAsync('/whoami', { response: headersSchema, signal: caller.signal });
    const [err] = extract(await single.observe(caller.signal));

    expect(err).toBeNull();
    expect(getEventListeners(caller.signal, 'abort')).toHaveLength(0);
  });
});
