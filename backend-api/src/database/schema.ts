import { bigint, boolean, index, integer, pgTable, text, uuid } from 'drizzle-orm/pg-core';

// Time fields are stored as Unix milliseconds (bigint) so that comparisons during
// sync are plain integer comparisons on both server and client.

// One row per synchronized record, whatever its kind. The primary key on `id`
// keeps ids unique across kinds and owners.
export const syncRecords = pgTable(
  'sync_records',
  {
    id: uuid('id').primaryKey(),
    kind: text('kind').notNull(), // trip/day/activity/budget_item/note
    userId: uuid('user_id').notNull(),
    parentId: uuid('parent_id'),
    localUpdatedAt: bigint('local_updated_at', { mode: 'number' }).notNull(),
    isDeleted: boolean('is_deleted').notNull().default(false),
    // Bumped on every write; used for compare-and-swap updates.
    rowVersion: integer('row_version').notNull().default(1),
    payloadJson: text('payload_json').notNull(), // wire form of the record
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    updatedAt: bigint('updated_at', { mode: 'number' }).notNull(),
  },
  (t) => ({
    ownerKindChangedIdx: index('sync_records_user_kind_updated_idx').on(t.userId, t.kind, t.localUpdatedAt),
    parentIdx: index('sync_records_parent_idx').on(t.parentId),
  }),
);

export type SyncRecordRow = typeof syncRecords.$inferSelect;
