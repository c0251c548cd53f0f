import request from 'supertest';

const mockDataSource = {
  isInitialized: true,
  query: jest.fn(),
  getRepository: jest.fn(() => ({})),
};

jest.mock('./config/data-source', () => ({
  AppDataSource: mockDataSource,
}));

import { createApp } from './app';

describe('Health endpoints', () => {
  beforeEach(() => {
    mockDataSource.query.mockReset();
  });

  it('reports the process as up', async () => {
    const res = await request(createApp()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('OK');
  });

  it('returns 503 when datasource is not initialized', async () => {
    mockDataSource.isInitialized = false;
    const app = createApp();

    const res = await request(app).get('/health/db');
    expect(res.status).toBe(503);
    expect(res.body).toEqual({ status: 'DOWN', reason: 'Datasource not initialized' });
  });

  it('returns 200 when db query succeeds', async () => {
    mockDataSource.isInitialized = true;
    mockDataSource.query.mockResolvedValueOnce([{ 1: 1 }]);
    const app = createApp();

    const res = await request(app).get('/health/db');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('OK');
    expect(mockDataSource.query).toHaveBeenCalledWith('SELECT 1');
  });

  it('returns 503 when db query fails', async () => {
    mockDataSource.isInitialized = true;
    mockDataSource.query.mockRejectedValue(new Error('DB down'));
    const app = createApp();

    const res = await request(app).get('/health/db');
    expect(res.status).toBe(503);
    expect(res.body).toEqual({ status: 'DOWN', error: 'DB down' });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await request(createApp()).get('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not Found', message: 'Route GET /api/nothing-here does not exist' });
  });
});

describe('API rate limit', () => {
  const originalMax = process.env.RATE_LIMIT_MAX;
  const originalTrustProxy = process.env.TRUST_PROXY;

  const restore = (key: 'RATE_LIMIT_MAX' | 'TRUST_PROXY', value: string | undefined) => {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  };

  beforeEach(() => {
    process.env.RATE_LIMIT_MAX = '1';
    delete process.env.TRUST_PROXY;
  });

  afterEach(() => {
    restore('RATE_LIMIT_MAX', originalMax);
    restore('TRUST_PROXY', originalTrustProxy);
  });

  it('keeps limiting a client that rotates X-Forwarded-For', async () => {
    const app = createApp();

    const first = await request(app).get('/api/unknown').set('X-Forwarded-For', '203.0.113.1');
    const second = await request(app).get('/api/unknown').set('X-Forwarded-For', '203.0.113.2');

    expect(first.status).toBe(404);
    expect(second.status).toBe(429);
    expect(second.headers['retry-after']).toBe('60');
    expect(second.body).toMatchObject({ code: 'RATE_LIMITED', statusCode: 429 });
  });

  it('keys on the forwarded client address behind a trusted proxy', async () => {
    process.env.TRUST_PROXY = 'loopback';
    const app = createApp();

    const first = await request(app).get('/api/unknown').set('X-Forwarded-For', '203.0.113.1');
    const second = await request(app).get('/api/unknown').set('X-Forwarded-For', '203.0.113.2');
    const repeat = await request(app).get('/api/unknown').set('X-Forwarded-For', '203.0.113.1');

    expect([first.status, second.status, repeat.status]).toEqual([404, 404, 429]);
  });
});
