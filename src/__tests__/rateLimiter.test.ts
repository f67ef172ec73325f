import request from 'supertest';
import express from 'express';
import { createRateLimiter } from '../middleware/rateLimiter';
import { errorHandler } from '../middleware/errorHandler';
import { ErrorCode } from '../types';

const createTestApp = () => {
  const app = express();

  app.use(createRateLimiter({
    windowMs: 60000,
    max: 2,
    errorMessage: 'Too many requests in test',
    skip: () => false
  }));
  app.get('/ping', (req, res) => {
    res.json({ ok: true });
  });
  app.use(errorHandler);

  return app;
};

describe('Rate Limiter', () => {
  it('should let requests through up to the limit', async () => {
    const app = createTestApp();

    await request(app).get('/ping').expect(200);
    const response = await request(app).get('/ping').expect(200);

    expect(response.headers['ratelimit-limit']).toBe('2');
  });

  it('should reject requests over the limit with the error envelope', async () => {
    const app = createTestApp();

    await request(app).get('/ping').expect(200);
    await request(app).get('/ping').expect(200);
    const response = await request(app).get('/ping').expect(429);

    expect(response.headers['retry-after']).toBe('60');
    expect(response.body).toMatchObject({
      success: false,
      error: {
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: 'Too many requests in test',
        details: { limit: 2, windowMs: 60000, retryAfter: 60 }
      }
    });
  });

  it('should skip limiting under test by default', async () => {
    const app = express();
    app.use(createRateLimiter({ windowMs: 60000, max: 1, errorMessage: 'limited' }));
    app.get('/ping', (req, res) => {
      res.json({ ok: true });
    });

    await request(app).get('/ping').expect(200);
    await request(app).get('/ping').expect(200);
  });
});
