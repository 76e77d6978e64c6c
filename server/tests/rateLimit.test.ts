import express from 'express';
import request from 'supertest';
import { ENV } from '../src/lib/env';
import { rateLimiter, resetRateLimits, trackedClientCount } from '../src/lib/rateLimit';

function createApp() {
  const app = express();
  app.set('trust proxy', true);
  app.use(rateLimiter);
  app.get('/', (_req, res) => {
    res.json({ ok: true });
  });
  return app;
}

describe('rateLimiter', () => {
  beforeEach(() => {
    resetRateLimits();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('drops expired client buckets when a new window opens', async () => {
    const app = createApp();
    const now = jest.spyOn(Date, 'now').mockReturnValue(1_000);

    await request(app).get('/').set('X-Forwarded-For', '10.0.0.1').expect(200);
    await request(app).get('/').set('X-Forwarded-For', '10.0.0.2').expect(200);
    expect(trackedClientCount()).toBe(2);

    now.mockReturnValue(1_000 + ENV.RATE_LIMIT_WINDOW_MS);
    await request(app).get('/').set('X-Forwarded-For', '10.0.0.3').expect(200);

    expect(trackedClientCount()).toBe(1);
  });
});
