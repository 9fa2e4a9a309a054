/**
 * Local record store: what the app writes while offline and what sync reads.
 *
 * Records are kept in wire form (`payload_json`) together with the columns sync
 * filters on. Every write through here marks the record `pending`.
 */
import {
  formatSyncTimestamp,
  parseSyncRow,
  toWireRow,
  type AnySyncRow,
  type EntityKind,
  type SyncRowOf,
} from '@tripsync/shared';
import { and, eq } from 'drizzle-orm';
import type { z } from 'zod';

import type { LocalDatabase } from '../database/db.js';
import { LocalSyncStatus, localRecords, syncState, type LocalRecordRow } from '../database/schema.js';

export type LocalWriteResult = { ok: true; id: string } | { ok: false; error: string };

export type LocalRecord<K extends EntityKind> = {
  row: SyncRowOf<K>;
  syncStatus: LocalSyncStatus;
  lastError: string | null;
};

const WATERMARK_KEY = 'last_sync_at';

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(record)'}: ${i.message}`).join('; ');
}

/** Decodes a stored payload; null when it no longer matches its kind's schema. */
export function decodeLocalPayload<K extends EntityKind>(kind: K, r: Pick<LocalRecordRow, 'payloadJson'>): SyncRowOf<K> | null {
  let payload: unknown;
  try {
    payload = JSON.parse(r.payloadJson);
  } catch {
    return null;
  }
  const parsed = parseSyncRow(kind, payload);
  return parsed.success ? parsed.data : null;
}

export async function writeLocalRow(db: LocalDatabase, kind: EntityKind, row: AnySyncRow, status: LocalSyncStatus) {
  const values = {
    payloadJson: JSON.stringify(toWireRow(row)),
    localUpdatedAt: row.local_updated_at,
    isDeleted: row.is_deleted,
    syncStatus: status,
    lastError: null,
  };
  await db
    .insert(localRecords)
    .values({ id: row.id, kind, ...values })
    .onConflictDoUpdate({ target: localRecords.id, set: values });
}

/** Validates a record in wire form and stores it as pending. Callers set `local_updated_at`. */
export async function saveLocalRecord(db: LocalDatabase, kind: EntityKind, wire: unknown): Promise<LocalWriteResult> {
  const parsed = parseSyncRow(kind, wire);
  if (!parsed.success) return { ok: false, error: describeIssues(parsed.error) };
  const row = parsed.data;

  const existing = await db
    .select({ kind: localRecords.kind })
    .from(localRecords)
    .where(eq(localRecords.id, row.id))
    .limit(1);
  const other = existing[0];
  if (other && other.kind !== kind) return { ok: false, error: `id ${row.id} is already used by a ${other.kind}` };

  await writeLocalRow(db, kind, row, LocalSyncStatus.Pending);
  return { ok: true, id: row.id };
}

export async function getLocalRecord<K extends EntityKind>(
  db: LocalDatabase,
  kind: K,
  id: string,
): Promise<LocalRecord<K> | null> {
  const rows = await db
    .select()
    .from(localRecords)
    .where(and(eq(localRecords.id, id), eq(localRecords.kind, kind)))
    .limit(1);
  const r = rows[0];
  if (!r) return null;
  const row = decodeLocalPayload(kind, r);
  if (!row) throw new Error(`local ${kind} ${id} has a corrupt payload`);
  return { row, syncStatus: r.syncStatus, lastError: r.lastError };
}

/** Writes a tombstone; the record stays until the deletion has been synced. */
export async function markLocalDeleted(
  db: LocalDatabase,
  kind: EntityKind,
  id: string,
  at: number,
): Promise<LocalWriteResult> {
  const current = await getLocalRecord(db, kind, id);
  if (!current) return { ok: false, error: `${kind} ${id} not found` };
  const tombstone = { ...toWireRow(current.row), is_deleted: true, local_updated_at: formatSyncTimestamp(at) };
  return saveLocalRecord(db, kind, tombstone);
}

export async function markLocalError(db: LocalDatabase, id: string, message: string) {
  await db
    .update(localRecords)
    .set({ syncStatus: LocalSyncStatus.Error, lastError: message })
    .where(eq(localRecords.id, id));
}

/** Deletes tombstones the server already has. Returns how many were removed. */
export async function purgeSyncedTombstones(db: LocalDatabase): Promise<number> {
  const res = await db
    .delete(localRecords)
    .where(and(eq(localRecords.isDeleted, true), eq(localRecords.syncStatus, LocalSyncStatus.Synced)));
  return res.changes;
}

export async function getWatermark(db: LocalDatabase): Promise<string | null> {
  const rows = await db.select({ value: syncState.value }).from(syncState).where(eq(syncState.key, WATERMARK_KEY)).limit(1);
  return rows[0]?.value ?? null;
}

export async function setWatermark(db: LocalDatabase, value: string, now: number) {
  await db
    .insert(syncState)
    .values({ key: WATERMARK_KEY, value, updatedAt: now })
    .onConflictDoUpdate({ target: syncState.key, set: { value, updatedAt: now } });
}
