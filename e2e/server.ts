import { Hono } from 'hono';
import { z } from 'zod';
import { validator } from '../src/utils/validator.js';
import { safeWrapAsync } from '../src/utils/wrap.js';

export type E2EServer = {
  /** Fetch implementation answering from the app, without opening a socket. */
  fetch: typeof fetch;
  reset: () => void;
  getCounts: () => Record<string, number>;
};

const userSchema = z.object({ login: z.string().min(1) });

export function createE2EServer(): E2EServer {
  const counts: Record<string, number> = {};
  const app = new Hono();

  function increment(key: string) {
    counts[key] = (counts[key] ?? 0) + 1;
    return counts[key];
  }

  app.use('*', async (c, next) => {
    increment(`${c.req.method} ${c.req.path}`);

    if (c.req.header('x-type') !== 'e2e-global') {
      return c.json({ error: 'missing global header' }, 500);
    }

    await next();
  });

  app.get('/users/:login', (c) => {
    const login = c.req.param('login');
    if (login === 'missing') {
      return c.json({ message: 'Not Found' }, 404);
    }

    return c.json({ login });
  });

  app.post('/users', async (c) => {
    if (c.req.header('content-type') !== 'application/json') {
      return c.json({ error: 'unexpected content type' }, 415);
    }

    const [errParse, parsed] = await safeWrapAsync(() => c.req.json());
    if (errParse) {
      return c.json({ error: 'invalid json', details: errParse.message }, 400);
    }

    const [errValidate, user] = await validator(parsed, userSchema);
    if (errValidate) {
      return c.json({ error: 'invalid request body', details: errValidate.message }, 400);
    }

    return c.json({ created: true, user }, 201);
  });

  app.delete('/users/:login', (c) => c.body(null, 204));

  app.get('/search', (c) => c.json({ search: new URL(c.req.url).search }));

  app.get('/headers', (c) => c.json(c.req.header()));

  app.get('/empty', (c) => c.body(null, 200));

  app.get('/page', (c) => c.html('<h>Hello</h>'));

  app.get('/bad', (c) => c.json({ login: 42 }));

  return {
    fetch: async (input, init) => app.fetch(new Request(input, init)),
    reset: () => {
      for (const k of Object.keys(counts)) {
        delete counts[k];
      }
    },
    getCounts: () => structuredClone(counts),
  };
}
