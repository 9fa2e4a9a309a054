/**
 * Classification of per-record errors returned by the server.
 */

// The record itself is fine; the next cycle may succeed (parent pushed later, race lost).
const RETRYABLE_CODES = new Set(['sync_dependency_missing', 'sync_write_conflict']);

export function isRetryableRecordError(code: string): boolean {
  return RETRYABLE_CODES.has(code);
}
