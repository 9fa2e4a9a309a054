// Sync timestamps travel as ISO-8601 strings and are compared as Unix milliseconds.

const DATE_TIME_PREFIX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;
const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

// UTC years 0000..9999; outside them toISOString() writes a six-digit year.
export const MIN_SYNC_TIMESTAMP = Date.parse('0000-01-01T00:00:00.000Z');
export const MAX_SYNC_TIMESTAMP = Date.parse('9999-12-31T23:59:59.999Z');

/**
 * Parses a client timestamp. A value without a zone designator is read as UTC,
 * as is the `YYYY-MM-DD HH:MM:SS` form older clients send.
 */
export function parseSyncTimestamp(raw: string): number | null {
  const value = raw.trim();
  if (!value) return null;
  const iso = value.includes('T') ? value : value.replace(' ', 'T');
  if (!DATE_TIME_PREFIX.test(iso)) return null;
  const ms = Date.parse(ZONE_SUFFIX.test(iso) ? iso : `${iso}Z`);
  if (!Number.isFinite(ms)) return null;
  return ms >= MIN_SYNC_TIMESTAMP && ms <= MAX_SYNC_TIMESTAMP ? ms : null;
}

export function formatSyncTimestamp(ms: number): string {
  return new Date(ms).toISOString();
}
