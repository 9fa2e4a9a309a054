export { openLocalDatabase, type LocalDatabase } from './database/db.js';
export { LocalSyncStatus } from './database/schema.js';
export {
  getLocalRecord,
  getWatermark,
  markLocalDeleted,
  purgeSyncedTombstones,
  saveLocalRecord,
  type LocalRecord,
  type LocalWriteResult,
} from './services/localStore.js';
export { collectPending, type PendingBatch, type PushedRecord } from './services/sync/pushCollector.js';
export { applyServerData, type ApplyResult } from './services/sync/pullApplicator.js';
export { SyncService, type SyncRunResult, type SyncServiceOptions, type SyncStatus } from './services/syncService.js';
