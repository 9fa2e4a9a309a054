import { ConflictStrategy, formatSyncTimestamp, syncResponseSchema } from '@tripsync/shared';
import { z } from 'zod';

import type { LocalDatabase } from '../database/db.js';
import { httpAuthed, type HttpResult } from './httpClient.js';
import { getWatermark, purgeSyncedTombstones, setWatermark } from './localStore.js';
import { applyServerData } from './sync/pullApplicator.js';
import { collectPending } from './sync/pushCollector.js';

export type SyncRunResult =
  | { ok: true; pushed: number; pulled: number; conflicts: number; rejected: number; purged: number; watermark: string }
  | { ok: false; error: string; status?: number };

export type SyncState = 'idle' | 'syncing' | 'success' | 'error';

export type SyncStatus = {
  state: SyncState;
  lastSyncAt: number | null;
  lastError: string | null;
  lastResult: SyncRunResult | null;
};

export type SyncServiceOptions = {
  apiBaseUrl: string;
  /** Read before every run; null means signed out. */
  getAccessToken: () => string | null | Promise<string | null>;
  timeoutMs?: number;
  maxRowsPerKind?: number;
  /** Remove tombstones once the server has them. */
  purgeTombstones?: boolean;
  logSync?: (msg: string) => void;
  now?: () => number;
};

const errorBodySchema = z.object({ error: z.string() });

function describeHttpError(res: HttpResult): string {
  const body = errorBodySchema.safeParse(res.json);
  const detail = body.success ? body.data.error : (res.text ?? '');
  return detail ? `HTTP ${res.status}: ${detail}` : `HTTP ${res.status}`;
}

export class SyncService {
  private state: SyncState = 'idle';
  private lastSyncAt: number | null = null;
  private lastError: string | null = null;
  private lastResult: SyncRunResult | null = null;
  private inFlight = false;
  private readonly listeners = new Set<(status: SyncStatus) => void>();

  constructor(
    private readonly db: LocalDatabase,
    private readonly opts: SyncServiceOptions,
  ) {}

  getStatus(): SyncStatus {
    return {
      state: this.state,
      lastSyncAt: this.lastSyncAt,
      lastError: this.lastError,
      lastResult: this.lastResult,
    };
  }

  /** Returns an unsubscribe function. */
  onStatusChange(listener: (status: SyncStatus) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setState(state: SyncState) {
    this.state = state;
    const status = this.getStatus();
    for (const listener of this.listeners) listener(status);
  }

  private now() {
    return (this.opts.now ?? Date.now)();
  }

  private log(msg: string) {
    this.opts.logSync?.(`[sync] ${msg}`);
  }

  async sync(opts: { strategy?: ConflictStrategy } = {}): Promise<SyncRunResult> {
    // Never two runs at once.
    if (this.inFlight) return { ok: false, error: 'sync busy' };
    this.inFlight = true;

    this.lastError = null;
    this.setState('syncing');
    let result: SyncRunResult;
    try {
      result = await this.runOnce(opts.strategy ?? ConflictStrategy.NewerWins);
    } catch (e) {
      result = { ok: false, error: e instanceof Error ? e.message : String(e) };
    } finally {
      this.inFlight = false;
    }

    this.lastResult = result;
    if (result.ok) {
      this.lastSyncAt = this.now();
      this.setState('success');
    } else {
      this.lastError = result.error;
      this.log(`failed: ${result.error}`);
      this.setState('error');
    }
    return result;
  }

  private async runOnce(strategy: ConflictStrategy): Promise<SyncRunResult> {
    const logSync = (msg: string) => this.log(msg);
    const accessToken = await this.opts.getAccessToken();
    const watermark = await getWatermark(this.db);
    const batch = await collectPending(this.db, {
      strategy,
      watermark,
      maxRowsPerKind: this.opts.maxRowsPerKind ?? 500,
      logSync,
    });
    this.log(`push pending=${batch.pushed.length} since=${watermark ?? 'never'} strategy=${strategy}`);

    const res = await httpAuthed(
      this.opts.apiBaseUrl,
      '/api/sync',
      { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(batch.request) },
      { accessToken, timeoutMs: this.opts.timeoutMs },
    );
    if (!res.ok) return { ok: false, status: res.status, error: describeHttpError(res) };

    const parsed = syncResponseSchema.safeParse(res.json);
    if (!parsed.success) return { ok: false, status: res.status, error: 'invalid sync response' };
    const response = parsed.data;

    const applied = await applyServerData(this.db, response, batch.pushed, logSync);
    const nextWatermark = formatSyncTimestamp(response.sync_timestamp);
    await setWatermark(this.db, nextWatermark, this.now());
    const purged = this.opts.purgeTombstones ? await purgeSyncedTombstones(this.db) : 0;

    this.log(
      `done pushed=${batch.pushed.length} pulled=${applied.applied} kept_local=${applied.keptLocal} ` +
        `rejected=${applied.markedError} requeued=${applied.requeued} conflicts=${response.conflicts_resolved} watermark=${nextWatermark}`,
    );
    return {
      ok: true,
      pushed: batch.pushed.length,
      pulled: applied.applied,
      conflicts: response.conflicts_resolved,
      rejected: response.errors.length,
      purged,
      watermark: nextWatermark,
    };
  }
}
