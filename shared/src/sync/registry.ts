/**
 * SyncKindRegistry -- single source of truth for the five synchronized entity kinds.
 *
 * Centralizes:
 *  - the zod schema of each kind
 *  - the wire array key (`trips`, `days`, ...)
 *  - the parent reference of a row (used for dependency checks)
 *
 * Used by the server engine and the client collector alike.
 */
import type { z } from 'zod';

import {
  activityRowSchema,
  budgetItemRowSchema,
  dayRowSchema,
  noteRowSchema,
  tripRowSchema,
  type SyncRowByKind,
  type WireRow,
} from './dto.js';
import { ENTITY_KIND_ORDER, EntityKind, SyncWireKey } from './kinds.js';
import { formatSyncTimestamp } from './timestamps.js';

// ────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────

export type SyncRowOf<K extends EntityKind> = SyncRowByKind[K];

export type AnySyncRow = SyncRowByKind[EntityKind];

export type ParentRef = {
  kind: EntityKind;
  id: string;
};

export type SyncKindEntry<K extends EntityKind> = {
  kind: K;
  wireKey: (typeof SyncWireKey)[K];
  schema: z.ZodType<SyncRowOf<K>, z.ZodTypeDef, unknown>;
  /** The one parent this row must hang off; null for top-level kinds. */
  parentOf: (row: SyncRowOf<K>) => ParentRef | null;
};

export type SyncKindRegistryShape = { [K in EntityKind]: SyncKindEntry<K> };

function tripOrDay(row: { trip_id: string | null; day_id: string | null }): ParentRef | null {
  if (row.trip_id !== null) return { kind: EntityKind.Trip, id: row.trip_id };
  if (row.day_id !== null) return { kind: EntityKind.Day, id: row.day_id };
  return null;
}

// ────────────────────────────────────────────────────────────
// Registry
// ────────────────────────────────────────────────────────────

export const SyncKindRegistry: SyncKindRegistryShape = {
  [EntityKind.Trip]: {
    kind: EntityKind.Trip,
    wireKey: SyncWireKey[EntityKind.Trip],
    schema: tripRowSchema,
    parentOf: () => null,
  },
  [EntityKind.Day]: {
    kind: EntityKind.Day,
    wireKey: SyncWireKey[EntityKind.Day],
    schema: dayRowSchema,
    parentOf: (row) => ({ kind: EntityKind.Trip, id: row.trip_id }),
  },
  [EntityKind.Activity]: {
    kind: EntityKind.Activity,
    wireKey: SyncWireKey[EntityKind.Activity],
    schema: activityRowSchema,
    parentOf: (row) => ({ kind: EntityKind.Day, id: row.day_id }),
  },
  [EntityKind.BudgetItem]: {
    kind: EntityKind.BudgetItem,
    wireKey: SyncWireKey[EntityKind.BudgetItem],
    schema: budgetItemRowSchema,
    parentOf: tripOrDay,
  },
  [EntityKind.Note]: {
    kind: EntityKind.Note,
    wireKey: SyncWireKey[EntityKind.Note],
    schema: noteRowSchema,
    parentOf: tripOrDay,
  },
};

export function getSyncKindEntry<K extends EntityKind>(kind: K): SyncKindEntry<K> {
  return SyncKindRegistry[kind];
}

/** Registry entries in dependency-safe order (parents first). */
export function syncKindEntries(): SyncKindRegistryShape[EntityKind][] {
  return ENTITY_KIND_ORDER.map((kind) => SyncKindRegistry[kind]);
}

export function parseSyncRow<K extends EntityKind>(kind: K, raw: unknown) {
  return getSyncKindEntry(kind).schema.safeParse(raw);
}

export function toWireRow<R extends { local_updated_at: number }>(row: R): WireRow<R> {
  const { local_updated_at, ...rest } = row;
  return { ...rest, local_updated_at: formatSyncTimestamp(local_updated_at) };
}

// ────────────────────────────────────────────────────────────
// Substantive comparison
// ────────────────────────────────────────────────────────────

// Identity and the modification instant are bookkeeping; everything else,
// `is_deleted` included, is content.
const NON_SUBSTANTIVE_FIELDS = new Set(['id', 'local_updated_at']);

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const v: unknown = Reflect.get(value, key);
      if (v !== undefined) out[key] = canonicalize(v);
    }
    return out;
  }
  return value;
}

export function substantiveFields(row: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    if (!NON_SUBSTANTIVE_FIELDS.has(key)) out[key] = value;
  }
  return out;
}

export function substantiveEquals(a: Record<string, unknown>, b: Record<string, unknown>): boolean {
  return JSON.stringify(canonicalize(substantiveFields(a))) === JSON.stringify(canonicalize(substantiveFields(b)));
}
