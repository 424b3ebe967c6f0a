import { Hono } from 'hono';
import { describe, expect, it } from 'vitest';
import z from 'zod';
import { isInvalidStatusError } from '../error/invalidStatusError.js';
import type { HttpClient } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { errorItem, valueItem } from './item.js';
import { fetchBoth, observeBoth } from './parallel.js';
import { Single } from './single.js';

describe('observeBoth', () => {
  it('keeps each item to itself', async () => {
    const failure = new Error('left failed');
    const left = Single.defer(async (): SafeWrapAsync<Error, number> => [failure, null]);
    const right = Single.defer(async (): SafeWrapAsync<Error, string> => [null, 'right']);

    const [a, b] = await observeBoth(left, right);

    expect(a).toEqual(errorItem(failure));
    expect(b).toEqual(valueItem('right'));
  });

  it('runs both at the same time', async () => {
    let running = 0;
    let peak = 0;
    const slow = () =>
      Single.defer(async (): SafeWrapAsync<Error, number> => {
        running += 1;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 10));
        running -= 1;
        return [null, peak];
      });

    await observeBoth(slow(), slow());

    expect(peak).toBe(2);
  });
});

describe('fetchBoth', () => {
  const app = new Hono();
  app.get('/user', (c) => c.json({ name: 'Marco' }));
  app.get('/missing', (c) => c.json({ error: 'not found' }, 404));
  const client: HttpClient = async (request) => app.fetch(request);

  const base = { client, method: 'GET' as const, deadline: 1_000, backoffInterval: 1, maxRetries: 0 };

  it('returns both envelopes', async () => {
    const [[errUser, user], [errCount, count]] = await fetchBoth(
      { ...base, url: 'http://svc.test/user', response: z.object({ name: z.string() }) },
      { ...base, url: 'http://svc.test/user', response: z.object({ name: z.string().transform((s) => s.length) }) },
    );

    expect(errUser).toBeNull();
    expect(user?.body).toEqual({ name: 'Marco' });
    expect(errCount).toBeNull();
    expect(count?.body).toEqual({ name: 5 });
  });

  it('does not let one failure affect the other', async () => {
    const [[errMissing, missing], [errUser, user]] = await fetchBoth(
      { ...base, url: 'http://svc.test/missing', response: z.object({ name: z.string() }) },
      { ...base, url: 'http://svc.test/user', response: z.object({ name: z.string() }) },
    );

    expect(missing).toBeNull();
    expect(isInvalidStatusError(errMissing)).toBe(true);
    expect(errUser).toBeNull();
    expect(user?.status).toBe(200);
  });
});
