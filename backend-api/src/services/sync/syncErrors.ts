/**
 * Error taxonomy of a sync cycle.
 *
 * Record-level errors (`SyncValidationError` and subclasses) are caught per record
 * and land in the report; everything else aborts the cycle.
 */
import type { EntityKind } from '@tripsync/shared';

export const SyncErrorCode = {
  InvalidRow: 'sync_invalid_row',
  DependencyMissing: 'sync_dependency_missing',
  IdentityViolation: 'sync_identity_violation',
  WriteConflict: 'sync_write_conflict',
  StaleWrite: 'sync_stale_write',
  StoreUnavailable: 'sync_store_unavailable',
} as const;

export type SyncErrorCode = (typeof SyncErrorCode)[keyof typeof SyncErrorCode];

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A single malformed record. Never aborts the batch. */
export class SyncValidationError extends SyncError {
  readonly kind: EntityKind;
  readonly recordId: string | null;

  constructor(
    kind: EntityKind,
    recordId: string | null,
    message: string,
    code: SyncErrorCode = SyncErrorCode.InvalidRow,
  ) {
    super(code, message);
    this.kind = kind;
    this.recordId = recordId;
  }
}

/** Id collision across kinds or owners, or a parent owned by somebody else. */
export class IdentityViolationError extends SyncValidationError {
  constructor(kind: EntityKind, recordId: string, message: string) {
    super(kind, recordId, message, SyncErrorCode.IdentityViolation);
  }
}

/** Compare-and-swap lost a race; the engine re-reads and re-resolves the record. */
export class StaleWriteError extends SyncError {
  constructor(kind: EntityKind, recordId: string) {
    super(SyncErrorCode.StaleWrite, `stale write for ${kind} ${recordId}`);
  }
}

/** The entity store could not be reached (or did not answer in time). Fatal for the cycle. */
export class StoreUnavailableError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SyncErrorCode.StoreUnavailable, message, options);
  }
}

export function isSyncValidationError(e: unknown): e is SyncValidationError {
  return e instanceof SyncValidationError;
}
