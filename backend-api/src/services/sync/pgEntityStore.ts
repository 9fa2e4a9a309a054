import {
  getSyncKindEntry,
  isEntityKind,
  parseSyncRow,
  toWireRow,
  type EntityKind,
  type SyncRowOf,
} from '@tripsync/shared';
import { and, asc, eq, gt, sql } from 'drizzle-orm';

import { db, type Database } from '../../database/db.js';
import { syncRecords, type SyncRecordRow } from '../../database/schema.js';
import type { EntityStore, StoredRecord, UpsertOptions } from './entityStore.js';
import { IdentityViolationError, StaleWriteError, StoreUnavailableError, SyncError } from './syncErrors.js';

function nowMs() {
  return Date.now();
}

function decodeRow<K extends EntityKind>(kind: K, r: Pick<SyncRecordRow, 'id' | 'payloadJson'>): SyncRowOf<K> {
  let payload: unknown;
  try {
    payload = JSON.parse(r.payloadJson);
  } catch {
    throw new Error(`sync_corrupt_payload: ${kind} ${r.id} is not valid json`);
  }
  const parsed = parseSyncRow(kind, payload);
  if (!parsed.success) {
    throw new Error(`sync_corrupt_payload: ${kind} ${r.id} ${parsed.error.message}`);
  }
  return parsed.data;
}

/** EntityStore over the `sync_records` table (drizzle + node-postgres). */
export class PgEntityStore implements EntityStore {
  constructor(private readonly database: Database = db) {}

  // Anything the driver throws (connection refused, pool timeout, ...) is a store failure.
  private async run<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (e) {
      if (e instanceof SyncError) throw e;
      throw new StoreUnavailableError(`entity store failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
  }

  async get<K extends EntityKind>(userId: string, kind: K, id: string): Promise<StoredRecord<K> | null> {
    const rows = await this.run(() =>
      this.database
        .select({ id: syncRecords.id, payloadJson: syncRecords.payloadJson, rowVersion: syncRecords.rowVersion })
        .from(syncRecords)
        .where(and(eq(syncRecords.id, id), eq(syncRecords.userId, userId), eq(syncRecords.kind, kind)))
        .limit(1),
    );
    const r = rows[0];
    if (!r) return null;
    return { row: decodeRow(kind, r), version: r.rowVersion };
  }

  async upsert<K extends EntityKind>(
    userId: string,
    kind: K,
    row: SyncRowOf<K>,
    opts: UpsertOptions,
  ): Promise<StoredRecord<K>> {
    const ts = nowMs();
    const parentId = getSyncKindEntry(kind).parentOf(row)?.id ?? null;
    const payloadJson = JSON.stringify(toWireRow(row));

    if (opts.expectedVersion === null) {
      const inserted = await this.run(() =>
        this.database
          .insert(syncRecords)
          .values({
            id: row.id,
            kind,
            userId,
            parentId,
            localUpdatedAt: row.local_updated_at,
            isDeleted: row.is_deleted,
            rowVersion: 1,
            payloadJson,
            createdAt: ts,
            updatedAt: ts,
          })
          .onConflictDoNothing({ target: syncRecords.id })
          .returning({ rowVersion: syncRecords.rowVersion }),
      );
      const first = inserted[0];
      if (first) return { row, version: first.rowVersion };

      // The id is taken: either a concurrent cycle inserted the same record first,
      // or the id belongs to another kind or owner.
      const owner = await this.kindOf(row.id);
      if (owner && owner.kind === kind && owner.userId === userId) throw new StaleWriteError(kind, row.id);
      throw new IdentityViolationError(kind, row.id, `id ${row.id} is already used by another record`);
    }

    const expected = opts.expectedVersion;
    const updated = await this.run(() =>
      this.database
        .update(syncRecords)
        .set({
          parentId,
          localUpdatedAt: row.local_updated_at,
          isDeleted: row.is_deleted,
          rowVersion: sql`${syncRecords.rowVersion} + 1`,
          payloadJson,
          updatedAt: ts,
        })
        .where(
          and(
            eq(syncRecords.id, row.id),
            eq(syncRecords.userId, userId),
            eq(syncRecords.kind, kind),
            eq(syncRecords.rowVersion, expected),
          ),
        )
        .returning({ rowVersion: syncRecords.rowVersion }),
    );
    const first = updated[0];
    if (!first) throw new StaleWriteError(kind, row.id);
    return { row, version: first.rowVersion };
  }

  async queryChangedSince<K extends EntityKind>(
    userId: string,
    kind: K,
    watermark: number | null,
  ): Promise<SyncRowOf<K>[]> {
    const rows = await this.run(() =>
      this.database
        .select({ id: syncRecords.id, payloadJson: syncRecords.payloadJson })
        .from(syncRecords)
        .where(
          and(
            eq(syncRecords.userId, userId),
            eq(syncRecords.kind, kind),
            watermark === null ? undefined : gt(syncRecords.localUpdatedAt, watermark),
          ),
        )
        .orderBy(asc(syncRecords.localUpdatedAt), asc(syncRecords.id)),
    );
    return rows.map((r) => decodeRow(kind, r));
  }

  async kindOf(id: string): Promise<{ kind: EntityKind; userId: string } | null> {
    const rows = await this.run(() =>
      this.database
        .select({ kind: syncRecords.kind, userId: syncRecords.userId })
        .from(syncRecords)
        .where(eq(syncRecords.id, id))
        .limit(1),
    );
    const r = rows[0];
    if (!r) return null;
    if (!isEntityKind(r.kind)) throw new Error(`sync_corrupt_payload: unknown kind ${r.kind} for ${id}`);
    return { kind: r.kind, userId: r.userId };
  }
}
