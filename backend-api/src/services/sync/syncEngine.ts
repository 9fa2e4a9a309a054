/**
 * SyncEngine -- one bidirectional sync cycle for one user.
 *
 * Flow: validate + apply client records (kind by kind, parents first) ->
 * collect server records changed after the watermark -> compute the new watermark.
 *
 * There is no transaction around the batch: each record is read, resolved and
 * written on its own (compare-and-swap on `row_version`), so records committed
 * before a failure or cancellation stay committed and a retry of the same batch
 * is a no-op for them.
 */
import {
  ENTITY_KIND_ORDER,
  EntityKind,
  getSyncKindEntry,
  parseSyncRow,
  substantiveEquals,
  toWireRow,
  type ConflictStrategy,
  type SyncRequest,
  type SyncRowOf,
  type SyncServerData,
  type WireRow,
} from '@tripsync/shared';
import { z } from 'zod';

import { createLogger, type ScopedLogger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/withTimeout.js';
import { resolveConflict } from './conflictResolver.js';
import type { EntityStore } from './entityStore.js';
import { syncEngineOptionsFromEnv, type SyncEngineOptions } from './syncConfig.js';
import {
  IdentityViolationError,
  StaleWriteError,
  StoreUnavailableError,
  SyncErrorCode,
  SyncValidationError,
  isSyncValidationError,
} from './syncErrors.js';
import { SyncReportBuilder, summarizeReport, type SyncReport } from './syncReport.js';

// ────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────

/** Raw client records per kind; each one is validated on its own. */
export type SyncChangeBatch = Record<EntityKind, unknown[]>;

export type SyncCycleInput = {
  userId: string;
  /** null on first sync: everything the user owns is returned. */
  watermark: number | null;
  changes: SyncChangeBatch;
  strategy: ConflictStrategy;
  signal?: AbortSignal | undefined;
};

export type SyncCycleResult = {
  serverChanges: SyncServerData;
  newWatermark: number;
  report: SyncReport;
};

type KindOutcome = {
  /** Ids whose stored version is now the client's own submission. */
  clientWonIds: Set<string>;
  /** Ids where the server kept its version; sent back so the client converges. */
  serverWonIds: Set<string>;
};

type CycleContext = {
  userId: string;
  watermark: number | null;
  strategy: ConflictStrategy;
  signal: AbortSignal | undefined;
  report: SyncReportBuilder;
  outcomes: Map<EntityKind, KindOutcome>;
  maxTouched: number | null;
  log: ScopedLogger;
};

export function changesFromRequest(req: SyncRequest): SyncChangeBatch {
  return {
    [EntityKind.Trip]: req.trips,
    [EntityKind.Day]: req.days,
    [EntityKind.Activity]: req.activities,
    [EntityKind.BudgetItem]: req.budget_items,
    [EntityKind.Note]: req.notes,
  };
}

const rawIdSchema = z.object({ id: z.string() });

function rawId(raw: unknown): string | null {
  const parsed = rawIdSchema.safeParse(raw);
  return parsed.success ? parsed.data.id : null;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(record)'}: ${i.message}`).join('; ');
}

function touch(ctx: CycleContext, ts: number) {
  ctx.maxTouched = ctx.maxTouched === null ? ts : Math.max(ctx.maxTouched, ts);
}

// ────────────────────────────────────────────────────────────
// Engine
// ────────────────────────────────────────────────────────────

export class SyncEngine {
  constructor(
    private readonly store: EntityStore,
    private readonly options: SyncEngineOptions = syncEngineOptionsFromEnv(),
    private readonly now: () => number = Date.now,
  ) {}

  async sync(input: SyncCycleInput): Promise<SyncCycleResult> {
    const ctx: CycleContext = {
      userId: input.userId,
      watermark: input.watermark,
      strategy: input.strategy,
      signal: input.signal,
      report: new SyncReportBuilder(),
      outcomes: new Map(),
      maxTouched: null,
      log: createLogger('sync', { user: input.userId, strategy: input.strategy }),
    };

    for (const kind of ENTITY_KIND_ORDER) {
      const outcome: KindOutcome = { clientWonIds: new Set(), serverWonIds: new Set() };
      ctx.outcomes.set(kind, outcome);
      for (const raw of input.changes[kind]) {
        ctx.signal?.throwIfAborted();
        try {
          await this.applyRecord(ctx, kind, raw, outcome);
        } catch (e) {
          if (!isSyncValidationError(e)) throw e;
          ctx.report.noteError({ kind, id: e.recordId, code: e.code, message: e.message });
          ctx.log.warn('record rejected', { kind, id: e.recordId, code: e.code, message: e.message });
        }
      }
    }

    ctx.signal?.throwIfAborted();
    const serverChanges: SyncServerData = {
      trips: await this.download(ctx, EntityKind.Trip),
      days: await this.download(ctx, EntityKind.Day),
      activities: await this.download(ctx, EntityKind.Activity),
      budget_items: await this.download(ctx, EntityKind.BudgetItem),
      notes: await this.download(ctx, EntityKind.Note),
    };

    // Never regress; on an empty cycle still move forward to "now".
    let newWatermark = ctx.maxTouched ?? this.now();
    if (ctx.watermark !== null) newWatermark = Math.max(newWatermark, ctx.watermark);

    const report = ctx.report.build(newWatermark);
    ctx.log.info('cycle done', summarizeReport(report), { critical: true });
    return { serverChanges, newWatermark, report };
  }

  private call<T>(op: () => Promise<T>): Promise<T> {
    const ms = this.options.storeTimeoutMs;
    return withTimeout(op(), ms, () => new StoreUnavailableError(`entity store call timed out after ${ms}ms`));
  }

  private async applyRecord<K extends EntityKind>(
    ctx: CycleContext,
    kind: K,
    raw: unknown,
    outcome: KindOutcome,
  ): Promise<void> {
    const parsed = parseSyncRow(kind, raw);
    if (!parsed.success) throw new SyncValidationError(kind, rawId(raw), describeIssues(parsed.error));
    const incoming = parsed.data;

    for (let attempt = 1; attempt <= this.options.maxWriteAttempts; attempt += 1) {
      try {
        const current = await this.call(() => this.store.get(ctx.userId, kind, incoming.id));

        if (!current) {
          await this.assertNewIdentity(ctx, kind, incoming);
          await this.assertParent(ctx, kind, incoming);
          await this.call(() => this.store.upsert(ctx.userId, kind, incoming, { expectedVersion: null }));
          this.accept(ctx, kind, incoming, outcome);
          return;
        }

        if (substantiveEquals(incoming, current.row)) return;

        const resolution = resolveConflict(incoming, current.row, ctx.strategy);
        const conflict = {
          kind,
          id: incoming.id,
          clientUpdatedAt: incoming.local_updated_at,
          serverUpdatedAt: current.row.local_updated_at,
        };
        if (resolution.winner === 'server') {
          outcome.serverWonIds.add(incoming.id);
          ctx.report.noteConflict({ ...conflict, resolution: 'server_wins' });
          return;
        }

        await this.assertParent(ctx, kind, resolution.record);
        await this.call(() =>
          this.store.upsert(ctx.userId, kind, resolution.record, { expectedVersion: current.version }),
        );
        ctx.report.noteConflict({ ...conflict, resolution: 'client_wins' });
        this.accept(ctx, kind, resolution.record, outcome);
        return;
      } catch (e) {
        if (!(e instanceof StaleWriteError)) throw e;
        ctx.log.debug('concurrent write, retrying', { kind, id: incoming.id, attempt });
      }
    }

    throw new SyncValidationError(
      kind,
      incoming.id,
      `gave up after ${this.options.maxWriteAttempts} concurrent write attempts`,
      SyncErrorCode.WriteConflict,
    );
  }

  private accept<K extends EntityKind>(ctx: CycleContext, kind: K, row: SyncRowOf<K>, outcome: KindOutcome) {
    outcome.clientWonIds.add(row.id);
    outcome.serverWonIds.delete(row.id);
    ctx.report.noteUpload(kind);
    touch(ctx, row.local_updated_at);
  }

  private async assertNewIdentity<K extends EntityKind>(ctx: CycleContext, kind: K, row: SyncRowOf<K>) {
    const owner = await this.call(() => this.store.kindOf(row.id));
    if (!owner) return;
    const where = owner.userId === ctx.userId ? `a ${owner.kind}` : 'another user';
    throw new IdentityViolationError(kind, row.id, `id ${row.id} is already used by ${where}`);
  }

  private async assertParent<K extends EntityKind>(ctx: CycleContext, kind: K, row: SyncRowOf<K>) {
    const parent = getSyncKindEntry(kind).parentOf(row);
    if (!parent) return;
    const found = await this.call(() => this.store.get(ctx.userId, parent.kind, parent.id));
    if (found) return;

    const owner = await this.call(() => this.store.kindOf(parent.id));
    if (owner) {
      throw new IdentityViolationError(kind, row.id, `parent ${parent.kind} ${parent.id} is not a ${parent.kind} of this user`);
    }
    throw new SyncValidationError(
      kind,
      row.id,
      `parent ${parent.kind} ${parent.id} does not exist`,
      SyncErrorCode.DependencyMissing,
    );
  }

  private async download<K extends EntityKind>(ctx: CycleContext, kind: K): Promise<WireRow<SyncRowOf<K>>[]> {
    const outcome = ctx.outcomes.get(kind);
    const changed = await this.call(() => this.store.queryChangedSince(ctx.userId, kind, ctx.watermark));

    // The client's own winning uploads are not echoed back.
    const rows = outcome ? changed.filter((r) => !outcome.clientWonIds.has(r.id)) : changed;
    const seen = new Set(rows.map((r) => r.id));
    for (const id of outcome?.serverWonIds ?? []) {
      if (seen.has(id)) continue;
      const stored = await this.call(() => this.store.get(ctx.userId, kind, id));
      if (stored) rows.push(stored.row);
    }

    ctx.report.noteDownloads(kind, rows.length);
    for (const row of rows) touch(ctx, row.local_updated_at);
    return rows.map((row) => toWireRow(row));
  }
}
