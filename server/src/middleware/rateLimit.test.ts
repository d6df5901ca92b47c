import express from 'express';
import request from 'supertest';
import { createRateLimit } from './rateLimit';

function createApp(max: number) {
  const app = express();

  app.use(createRateLimit({ windowMs: 60000, max }));
  app.get('/healthcheck', (_req, res) => {
    res.json({ services: {} });
  });

  return app;
}

describe('Rate Limit Middleware', () => {
  it('should allow requests under the limit', async () => {
    const res = await request(createApp(3)).get('/healthcheck');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ services: {} });
  });

  it('should return 429 after exceeding the limit', async () => {
    const app = createApp(2);

    await request(app).get('/healthcheck');
    await request(app).get('/healthcheck');
    const res = await request(app).get('/healthcheck');

    expect(res.status).toBe(429);
    expect(res.body).toEqual({ error: 'Too many requests, please try again later' });
    expect(res.headers['retry-after']).toBeDefined();
  });

  it('should send standard RateLimit headers only', async () => {
    const res = await request(createApp(5)).get('/healthcheck');

    expect(res.headers['ratelimit-limit']).toBe('5');
    expect(res.headers['ratelimit-remaining']).toBe('4');
    expect(res.headers['x-ratelimit-limit']).toBeUndefined();
  });
});
