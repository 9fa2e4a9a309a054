import { beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';

vi.mock('../database/db.js', () => ({
  db: { select: vi.fn(), insert: vi.fn(), update: vi.fn() },
  pool: { query: vi.fn(), end: vi.fn() },
}));

import { createApp } from '../app.js';
import { signAccessToken } from '../auth/jwt.js';
import { SyncEngine } from '../services/sync/syncEngine.js';
import { MemoryEntityStore } from './utils/memoryEntityStore.js';
import { TRIP_1, USER_A, USER_B, ms, tripWire } from './utils/syncFixtures.js';

let store: MemoryEntityStore;
let app: ReturnType<typeof createApp>;
let tokenA: string;

beforeAll(async () => {
  process.env.TRIPSYNC_JWT_SECRET = 'test-secret-test-secret-test-secret-123';
  tokenA = await signAccessToken({ id: USER_A, email: 'a@example.test' });
});

beforeEach(() => {
  store = new MemoryEntityStore();
  app = createApp({ syncEngine: new SyncEngine(store, { storeTimeoutMs: 50, maxWriteAttempts: 3 }, () => ms('12:00')) });
});

describe('backend routes', () => {
  it('GET /health returns ok', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.version).toBe('0.1.0');
  });

  it('POST /api/sync requires a bearer token', async () => {
    const res = await request(app).post('/api/sync').send({});
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ ok: false, error: 'missing bearer token' });
  });

  it('POST /api/sync rejects a forged token', async () => {
    const res = await request(app).post('/api/sync').set('Authorization', 'Bearer not.a.token').send({});
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ ok: false, error: 'invalid token' });
  });

  it('POST /api/sync rejects a token whose subject is not a user id', async () => {
    const token = await signAccessToken({ id: 'user-42', email: 'x@example.test' });

    const res = await request(app).post('/api/sync').set('Authorization', `Bearer ${token}`).send({});

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ ok: false, error: 'invalid token' });
    expect(store.calls.queryChangedSince).toBe(0);
  });

  it('POST /api/sync rejects an unknown strategy', async () => {
    const res = await request(app)
      .post('/api/sync')
      .set('Authorization', `Bearer ${tokenA}`)
      .send({ conflict_resolution: 'coin_flip' });
    expect(res.status).toBe(400);
    expect(res.body.ok).toBe(false);
    expect(Object.keys(res.body.error.fieldErrors)).toEqual(['conflict_resolution']);
  });

  it('POST /api/sync rejects malformed json', async () => {
    const res = await request(app)
      .post('/api/sync')
      .set('Authorization', `Bearer ${tokenA}`)
      .set('Content-Type', 'application/json')
      .send('{"trips": [');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: 'invalid json' });
  });

  it('POST /api/sync uploads and reports', async () => {
    const res = await request(app)
      .post('/api/sync')
      .set('Authorization', `Bearer ${tokenA}`)
      .send({ last_sync_at: null, trips: [tripWire(), { title: 'broken' }] });

    expect(res.status).toBe(200);
    expect(res.body.trips_uploaded).toBe(1);
    expect(res.body.trips_downloaded).toBe(0);
    expect(res.body.conflicts_resolved).toBe(0);
    expect(res.body.sync_timestamp).toBe('2024-05-01T10:00:00.000Z');
    expect(res.body.errors).toHaveLength(1);
    expect(res.body.errors[0]).toMatchObject({ entity_type: 'trip', entity_id: null, code: 'sync_invalid_row' });
    expect(store.entries.get(TRIP_1)?.userId).toBe(USER_A);
  });

  it('POST /api/sync reads a zoneless watermark as UTC', async () => {
    store.seed(USER_A, 'trip', tripWire());

    const res = await request(app)
      .post('/api/sync')
      .set('Authorization', `Bearer ${tokenA}`)
      .send({ last_sync_at: '2024-05-01 09:00:00' });

    expect(res.status).toBe(200);
    expect(res.body.server_data.trips).toEqual([tripWire()]);
    expect(res.body.sync_timestamp).toBe('2024-05-01T10:00:00.000Z');
  });

  it('POST /api/sync scopes data to the token user', async () => {
    store.seed(USER_A, 'trip', tripWire());
    const tokenB = await signAccessToken({ id: USER_B, email: 'b@example.test' });

    const res = await request(app).post('/api/sync').set('Authorization', `Bearer ${tokenB}`).send({});

    expect(res.status).toBe(200);
    expect(res.body.server_data.trips).toEqual([]);
    expect(res.body.sync_timestamp).toBe('2024-05-01T12:00:00.000Z');
  });

  it('POST /api/sync answers 503 when the store is down', async () => {
    store.unavailable = true;

    const res = await request(app).post('/api/sync').set('Authorization', `Bearer ${tokenA}`).send({});

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ ok: false, error: 'sync_store_unavailable' });
  });
});
