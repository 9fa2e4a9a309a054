/**
 * Pull applicator: applies a sync response to the local store.
 *
 * Pushed records are settled first (synced; left pending when the server asks for a
 * retry; error when it rejected the record itself), then every server row is written as synced unless the user edited the
 * record again while the request was in flight and that edit is newer.
 */
import { parseSyncRow, syncKindEntries, type SyncResponseEnvelope } from '@tripsync/shared';
import { and, eq } from 'drizzle-orm';

import type { LocalDatabase } from '../../database/db.js';
import { LocalSyncStatus, localRecords } from '../../database/schema.js';
import { describeIssues, writeLocalRow } from '../localStore.js';
import { isRetryableRecordError } from './errorRecovery.js';
import type { PushedRecord } from './pushCollector.js';

export type ApplyResult = {
  applied: number;
  keptLocal: number;
  skipped: number;
  markedSynced: number;
  markedError: number;
  requeued: number;
};

// Only touches the row if it is still the version that was pushed.
function unchangedSincePush(p: PushedRecord) {
  return and(
    eq(localRecords.id, p.id),
    eq(localRecords.localUpdatedAt, p.localUpdatedAt),
    eq(localRecords.syncStatus, LocalSyncStatus.Pending),
  );
}

async function settlePushed(
  db: LocalDatabase,
  response: SyncResponseEnvelope,
  pushed: PushedRecord[],
  result: ApplyResult,
) {
  const errorsById = new Map<string, { code: string; message: string }>();
  for (const e of response.errors) {
    if (e.entity_id) errorsById.set(e.entity_id, e);
  }

  for (const p of pushed) {
    const err = errorsById.get(p.id);
    if (err && isRetryableRecordError(err.code)) {
      const res = await db
        .update(localRecords)
        .set({ lastError: `${err.code}: ${err.message}` })
        .where(unchangedSincePush(p));
      result.requeued += res.changes;
      continue;
    }
    if (err) {
      const res = await db
        .update(localRecords)
        .set({ syncStatus: LocalSyncStatus.Error, lastError: `${err.code}: ${err.message}` })
        .where(unchangedSincePush(p));
      result.markedError += res.changes;
      continue;
    }
    const res = await db
      .update(localRecords)
      .set({ syncStatus: LocalSyncStatus.Synced, lastError: null })
      .where(unchangedSincePush(p));
    result.markedSynced += res.changes;
  }
}

export async function applyServerData(
  db: LocalDatabase,
  response: SyncResponseEnvelope,
  pushed: PushedRecord[],
  logSync: (msg: string) => void,
): Promise<ApplyResult> {
  const result: ApplyResult = { applied: 0, keptLocal: 0, skipped: 0, markedSynced: 0, markedError: 0, requeued: 0 };
  await settlePushed(db, response, pushed, result);

  for (const entry of syncKindEntries()) {
    for (const raw of response.server_data[entry.wireKey]) {
      const parsed = parseSyncRow(entry.kind, raw);
      if (!parsed.success) {
        result.skipped += 1;
        logSync(`pull skip invalid ${entry.kind}: ${describeIssues(parsed.error)}`);
        continue;
      }
      const row = parsed.data;

      const local = await db
        .select({ kind: localRecords.kind, localUpdatedAt: localRecords.localUpdatedAt, syncStatus: localRecords.syncStatus })
        .from(localRecords)
        .where(eq(localRecords.id, row.id))
        .limit(1);
      const current = local[0];
      if (current && current.kind !== entry.kind) {
        result.skipped += 1;
        logSync(`pull skip ${entry.kind} ${row.id}: id is used by a local ${current.kind}`);
        continue;
      }
      if (current && current.syncStatus === LocalSyncStatus.Pending && current.localUpdatedAt > row.local_updated_at) {
        result.keptLocal += 1;
        continue;
      }

      await writeLocalRow(db, entry.kind, row, LocalSyncStatus.Synced);
      result.applied += 1;
    }
  }

  return result;
}
