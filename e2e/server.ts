import { Hono } from 'hono';
import z from 'zod';
import type { HttpClient } from '../src/types/request.js';
import { validator } from '../src/utils/validator.js';
import { safeWrapAsync } from '../src/utils/wrap.js';

export type E2EServer = {
  url: string;
  client: HttpClient;
  reset: () => void;
  getCounts: () => Record<string, number>;
};

export const userSchema = z.object({ name: z.string(), email: z.string() });

/**
 * Builds the end-to-end service. It is served in process through `app.fetch`, so the
 * client under test goes through the full Request/Response cycle without a socket.
 */
export function createE2EServer(): E2EServer {
  const counts: Record<string, number> = {};
  const app = new Hono();

  function increment(key: string) {
    counts[key] = (counts[key] ?? 0) + 1;
    return counts[key];
  }

  app.use(async (c, next) => {
    increment(`${c.req.method} ${new URL(c.req.url).pathname}`);
    await next();
  });

  app.post('/users', async (c) => {
    const [errParse, parsed] = await safeWrapAsync(() => c.req.json());
    if (errParse) {
      return c.json({ error: 'invalid json', details: errParse.message }, 400);
    }

    const [errValidate, user] = await validator(parsed, userSchema);
    if (errValidate) {
      return c.json({ error: 'invalid request body', details: errValidate.message }, 400);
    }

    return c.json({ id: 1, ...user });
  });

  app.get('/users/:id', (c) => {
    if (c.req.param('id') !== '1') {
      return c.json({ error: 'user not found' }, 404);
    }

    return c.json({ id: 1, name: 'Adam Smith', email: 'adam.smith@hotmail.com' });
  });

  app.get('/headers', (c) =>
    c.json({
      accept: c.req.header('accept') ?? null,
      client: c.req.header('x-client') ?? null,
      trace: c.req.header('x-trace') ?? null,
    }),
  );

  app.get('/flaky', (c) => {
    const attempt = counts['GET /flaky'];
    const failTimes = Number(c.req.query('failTimes') ?? '1');
    if (attempt <= failTimes) {
      return c.json({ error: 'unavailable', attempt }, 503);
    }

    return c.json({ ok: true, attempt });
  });

  app.get('/bad', (c) => c.json({ data: 'wrong-format', etc: 'test' }));

  app.delete('/users/:id', (c) => c.body(null, 204));

  const client: HttpClient = async (request) => app.fetch(request);

  return {
    url: 'http://e2e.test',
    client,
    reset: () => {
      for (const k of Object.keys(counts)) {
        delete counts[k];
      }
    },
    getCounts: () => structuredClone(counts),
  };
}
