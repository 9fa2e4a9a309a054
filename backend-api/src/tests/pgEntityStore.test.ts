import { beforeEach, describe, expect, it, vi } from 'vitest';

import { EntityKind, dayRowSchema, tripRowSchema } from '@tripsync/shared';
import { IdentityViolationError, StaleWriteError, StoreUnavailableError } from '../services/sync/syncErrors.js';
import { makeInsertChain, makeQueuedSelectMock, makeUpdateChain } from './utils/dbMockHelpers.js';
import { DAY_1, TRIP_1, TRIP_2, USER_A, USER_B, dayWire, ms, tripWire } from './utils/syncFixtures.js';

const { dbSelect, dbInsert, dbUpdate } = vi.hoisted(() => ({
  dbSelect: vi.fn(),
  dbInsert: vi.fn(),
  dbUpdate: vi.fn(),
}));

vi.mock('../database/db.js', () => ({
  db: { select: dbSelect, insert: dbInsert, update: dbUpdate },
}));

import { PgEntityStore } from '../services/sync/pgEntityStore.js';

const selectQueue: unknown[][] = [];

function stored(wire: Record<string, unknown>, rowVersion = 1) {
  return { id: String(wire.id), payloadJson: JSON.stringify(wire), rowVersion };
}

describe('PgEntityStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    selectQueue.length = 0;
    dbSelect.mockImplementation(makeQueuedSelectMock(selectQueue));
  });

  it('get decodes the stored payload', async () => {
    selectQueue.push([stored(tripWire(), 4)]);
    const store = new PgEntityStore();

    const res = await store.get(USER_A, EntityKind.Trip, TRIP_1);

    expect(res).toEqual({ row: { ...tripWire(), local_updated_at: ms('10:00') }, version: 4 });
  });

  it('get returns null when nothing matches', async () => {
    const store = new PgEntityStore();
    expect(await store.get(USER_A, EntityKind.Trip, TRIP_1)).toBeNull();
  });

  it('get refuses a payload that no longer matches the schema', async () => {
    selectQueue.push([{ id: TRIP_1, payloadJson: '{"id":"x"', rowVersion: 1 }]);
    const store = new PgEntityStore();

    await expect(store.get(USER_A, EntityKind.Trip, TRIP_1)).rejects.toThrow(
      `sync_corrupt_payload: trip ${TRIP_1} is not valid json`,
    );
  });

  it('inserts a new record with its parent and wire payload', async () => {
    const chain = makeInsertChain([{ rowVersion: 1 }]);
    dbInsert.mockReturnValue(chain);
    const day = dayRowSchema.parse(dayWire());
    const { local_updated_at, ...rest } = dayWire();
    const store = new PgEntityStore();

    const res = await store.upsert(USER_A, EntityKind.Day, day, { expectedVersion: null });

    expect(res).toEqual({ row: day, version: 1 });
    expect(chain.values).toHaveBeenCalledWith(
      expect.objectContaining({
        id: DAY_1,
        kind: 'day',
        userId: USER_A,
        parentId: TRIP_1,
        localUpdatedAt: ms('10:00'),
        isDeleted: false,
        rowVersion: 1,
        payloadJson: JSON.stringify({ ...rest, local_updated_at }),
      }),
    );
  });

  it('reports a lost insert race on the same record as a stale write', async () => {
    dbInsert.mockReturnValue(makeInsertChain([]));
    selectQueue.push([{ kind: 'trip', userId: USER_A }]);
    const store = new PgEntityStore();

    await expect(
      store.upsert(USER_A, EntityKind.Trip, tripRowSchema.parse(tripWire()), { expectedVersion: null }),
    ).rejects.toBeInstanceOf(StaleWriteError);
  });

  it('reports an id taken by another owner as an identity violation', async () => {
    dbInsert.mockReturnValue(makeInsertChain([]));
    selectQueue.push([{ kind: 'trip', userId: USER_B }]);
    const store = new PgEntityStore();

    await expect(
      store.upsert(USER_A, EntityKind.Trip, tripRowSchema.parse(tripWire()), { expectedVersion: null }),
    ).rejects.toBeInstanceOf(IdentityViolationError);
  });

  it('updates only while the version still matches', async () => {
    const trip = tripRowSchema.parse(tripWire({ title: 'Rome' }));
    const store = new PgEntityStore();

    dbUpdate.mockReturnValueOnce(makeUpdateChain([{ rowVersion: 3 }]));
    expect(await store.upsert(USER_A, EntityKind.Trip, trip, { expectedVersion: 2 })).toEqual({ row: trip, version: 3 });

    dbUpdate.mockReturnValueOnce(makeUpdateChain([]));
    await expect(store.upsert(USER_A, EntityKind.Trip, trip, { expectedVersion: 2 })).rejects.toBeInstanceOf(
      StaleWriteError,
    );
  });

  it('queryChangedSince decodes every row', async () => {
    selectQueue.push([stored(tripWire()), stored(tripWire({ id: TRIP_2, title: 'Rome' }))]);
    const store = new PgEntityStore();

    const rows = await store.queryChangedSince(USER_A, EntityKind.Trip, ms('09:00'));

    expect(rows.map((r) => [r.id, r.title])).toEqual([
      [TRIP_1, 'Paris Trip'],
      [TRIP_2, 'Rome'],
    ]);
  });

  it('wraps driver failures into StoreUnavailableError', async () => {
    dbSelect.mockImplementation(() => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
    });
    const store = new PgEntityStore();

    const err = await store.kindOf(TRIP_1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err).toHaveProperty('message', 'entity store failed: connect ECONNREFUSED 127.0.0.1:5432');
    expect(err).toHaveProperty('code', 'sync_store_unavailable');
  });

  it('kindOf rejects a kind it does not know', async () => {
    selectQueue.push([{ kind: 'expense', userId: USER_A }]);
    const store = new PgEntityStore();

    await expect(store.kindOf(TRIP_1)).rejects.toThrow(`sync_corrupt_payload: unknown kind expense for ${TRIP_1}`);
  });
});
