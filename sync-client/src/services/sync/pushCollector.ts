/**
 * Push collector: builds one sync request from every pending local record.
 *
 * Kinds are walked in registry order (parents first), so a hierarchy created
 * offline reaches the server in an order it can accept in a single batch.
 */
import {
  syncKindEntries,
  toWireRow,
  type ConflictStrategy,
  type EntityKind,
  type SyncRequestBody,
  type SyncWireKey,
} from '@tripsync/shared';
import { and, asc, eq } from 'drizzle-orm';

import type { LocalDatabase } from '../../database/db.js';
import { LocalSyncStatus, localRecords } from '../../database/schema.js';
import { decodeLocalPayload, markLocalError } from '../localStore.js';

/** A record as it was when it left the device. */
export type PushedRecord = {
  kind: EntityKind;
  id: string;
  localUpdatedAt: number;
};

export type PendingBatch = {
  request: SyncRequestBody;
  pushed: PushedRecord[];
};

export type CollectOptions = {
  strategy: ConflictStrategy;
  watermark: string | null;
  maxRowsPerKind: number;
  logSync: (msg: string) => void;
};

async function collectKindPending(db: LocalDatabase, kind: EntityKind, opts: CollectOptions) {
  const pendingRows = await db
    .select()
    .from(localRecords)
    .where(and(eq(localRecords.kind, kind), eq(localRecords.syncStatus, LocalSyncStatus.Pending)))
    .orderBy(asc(localRecords.localUpdatedAt), asc(localRecords.id))
    .limit(opts.maxRowsPerKind);

  const rows: unknown[] = [];
  const pushed: PushedRecord[] = [];
  const invalidIds: string[] = [];

  for (const r of pendingRows) {
    const row = decodeLocalPayload(kind, r);
    if (!row) {
      invalidIds.push(r.id);
      continue;
    }
    rows.push(toWireRow(row));
    pushed.push({ kind, id: r.id, localUpdatedAt: r.localUpdatedAt });
  }

  for (const id of invalidIds) {
    await markLocalError(db, id, 'payload no longer matches the record schema');
  }
  if (invalidIds.length > 0) {
    opts.logSync(`push drop invalid ${kind} count=${invalidIds.length} ids=${invalidIds.slice(0, 5).join(',')}`);
  }

  return { rows, pushed };
}

export async function collectPending(db: LocalDatabase, opts: CollectOptions): Promise<PendingBatch> {
  const arrays: Record<SyncWireKey, unknown[]> = {
    trips: [],
    days: [],
    activities: [],
    budget_items: [],
    notes: [],
  };
  const pushed: PushedRecord[] = [];

  for (const entry of syncKindEntries()) {
    const pack = await collectKindPending(db, entry.kind, opts);
    arrays[entry.wireKey].push(...pack.rows);
    pushed.push(...pack.pushed);
  }

  return {
    request: { last_sync_at: opts.watermark, conflict_resolution: opts.strategy, ...arrays },
    pushed,
  };
}
