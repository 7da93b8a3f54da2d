import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import express from 'express';
import request from 'supertest';
import { requestContextMiddleware } from '../src/middleware/requestContext.middleware.js';
import { FixedWindowCounter, createRateLimiter } from '../src/middleware/rate-limit.middleware.js';
import { errorMiddleware } from '../src/middleware/error.middleware.js';

function appWith(counter: FixedWindowCounter, maxRequests: number) {
  const app = express();
  app.use(requestContextMiddleware);
  app.use('/limited', createRateLimiter({ windowMs: 60_000, maxRequests, keyPrefix: 'test' }, counter));
  app.get('/limited', (_req, res) => {
    res.json({ ok: true });
  });
  app.get('/trace', (req, res) => {
    res.json({ traceId: req.traceId });
  });
  app.use(errorMiddleware);
  return app;
}

describe('rate limiter', () => {
  const counter = new FixedWindowCounter();
  after(() => counter.destroy());

  it('answers 429 with a retry hint once the window is full', async () => {
    const app = appWith(counter, 2);

    const first = await request(app).get('/limited').set('x-forwarded-for', '10.0.0.1');
    assert.equal(first.status, 200);
    assert.equal(first.headers['x-ratelimit-remaining'], '1');
    await request(app).get('/limited').set('x-forwarded-for', '10.0.0.1');

    const blocked = await request(app).get('/limited').set('x-forwarded-for', '10.0.0.1').set('x-trace-id', 'rl-1');
    assert.equal(blocked.status, 429);
    assert.equal(blocked.headers['retry-after'], '60');
    assert.deepEqual(blocked.body, {
      error: 'Too many requests',
      code: 'RATE_LIMIT_EXCEEDED',
      traceId: 'rl-1',
      details: { retryAfter: 60 }
    });

    const otherClient = await request(app).get('/limited').set('x-forwarded-for', '10.0.0.2, 172.16.0.1');
    assert.equal(otherClient.status, 200);
  });

  it('starts a new window once the old one has expired', () => {
    const local = new FixedWindowCounter();
    try {
      assert.equal(local.hit('k', 1000, 0).count, 1);
      assert.equal(local.hit('k', 1000, 500).count, 2);
      assert.deepEqual(local.hit('k', 1000, 1000), { count: 1, resetTime: 2000 });
      assert.equal(local.size, 1);
    } finally {
      local.destroy();
    }
  });
});

describe('request context', () => {
  const counter = new FixedWindowCounter();
  after(() => counter.destroy());

  it('accepts x-request-id when no trace id is sent', async () => {
    const response = await request(appWith(counter, 10)).get('/trace').set('x-request-id', 'req-42');

    assert.equal(response.body.traceId, 'req-42');
    assert.equal(response.headers['x-trace-id'], 'req-42');
  });

  it('replaces a malformed trace id with a generated one', async () => {
    const response = await request(appWith(counter, 10)).get('/trace').set('x-trace-id', 'bad id with spaces');

    assert.notEqual(response.body.traceId, 'bad id with spaces');
    assert.match(response.body.traceId, /^[0-9a-f-]{36}$/);
  });
});
