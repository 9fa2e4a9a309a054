import type { EntityKind, SyncRowOf } from '@tripsync/shared';

export type StoredRecord<K extends EntityKind> = {
  row: SyncRowOf<K>;
  /** Monotonic write counter of the stored record. */
  version: number;
};

export type UpsertOptions = {
  /**
   * `null` inserts and fails if the id is already taken; a number updates only
   * while the stored version still equals it. A lost race throws `StaleWriteError`.
   */
  expectedVersion: number | null;
};

/**
 * Authoritative server-side store of synchronized records.
 *
 * Every operation is scoped to one owner. Implementations wrap driver failures
 * into `StoreUnavailableError`.
 */
export interface EntityStore {
  get<K extends EntityKind>(userId: string, kind: K, id: string): Promise<StoredRecord<K> | null>;

  upsert<K extends EntityKind>(
    userId: string,
    kind: K,
    row: SyncRowOf<K>,
    opts: UpsertOptions,
  ): Promise<StoredRecord<K>>;

  /** Records with `local_updated_at` strictly greater than `watermark`; all records when it is null. */
  queryChangedSince<K extends EntityKind>(userId: string, kind: K, watermark: number | null): Promise<SyncRowOf<K>[]>;

  /** Kind of the record stored under `id` for any owner, or null. Used for identity checks. */
  kindOf(id: string): Promise<{ kind: EntityKind; userId: string } | null>;
}
