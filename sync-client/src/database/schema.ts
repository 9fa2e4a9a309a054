import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// Timestamps are Unix milliseconds, same as on the server.

export const LocalSyncStatus = {
  Pending: 'pending',
  Synced: 'synced',
  Error: 'error',
} as const;

export type LocalSyncStatus = (typeof LocalSyncStatus)[keyof typeof LocalSyncStatus];

export const localRecords = sqliteTable(
  'local_records',
  {
    id: text('id').primaryKey(), // uuid
    kind: text('kind').notNull(),
    // Wire form of the record, as it is pushed.
    payloadJson: text('payload_json').notNull(),
    localUpdatedAt: integer('local_updated_at').notNull(),
    isDeleted: integer('is_deleted', { mode: 'boolean' }).notNull().default(false),
    syncStatus: text('sync_status', { enum: ['pending', 'synced', 'error'] }).notNull().default('pending'),
    lastError: text('last_error'),
  },
  (t) => ({
    kindStatusIdx: index('local_records_kind_status_idx').on(t.kind, t.syncStatus, t.localUpdatedAt),
  }),
);

export const syncState = sqliteTable('sync_state', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  updatedAt: integer('updated_at').notNull(),
});

export type LocalRecordRow = typeof localRecords.$inferSelect;
