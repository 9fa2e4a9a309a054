import { describe, expect, it } from 'vitest';

import { MAX_SYNC_TIMESTAMP, MIN_SYNC_TIMESTAMP, formatSyncTimestamp, parseSyncTimestamp } from './timestamps.js';

describe('sync timestamps', () => {
  it('parses ISO timestamps with a zone', () => {
    expect(parseSyncTimestamp('2024-05-01T10:00:00.000Z')).toBe(Date.UTC(2024, 4, 1, 10));
    expect(parseSyncTimestamp('2024-05-01T12:00:00+02:00')).toBe(Date.UTC(2024, 4, 1, 10));
  });

  it('reads zoneless values as UTC', () => {
    expect(parseSyncTimestamp('2024-05-01T10:00:00')).toBe(Date.UTC(2024, 4, 1, 10));
    expect(parseSyncTimestamp('2024-05-01 10:00:00')).toBe(Date.UTC(2024, 4, 1, 10));
  });

  it('rejects values that are not date-times', () => {
    expect(parseSyncTimestamp('')).toBeNull();
    expect(parseSyncTimestamp('yesterday')).toBeNull();
    expect(parseSyncTimestamp('2024-05-01')).toBeNull();
    expect(parseSyncTimestamp('2024-13-45T99:00:00Z')).toBeNull();
  });

  it('rejects offsets that push the instant out of four-digit years', () => {
    expect(parseSyncTimestamp('9999-12-31T23:59:00-05:00')).toBeNull();
    expect(parseSyncTimestamp('0000-01-01T00:00+01:00')).toBeNull();
  });

  it('keeps both ends of the range readable after formatting', () => {
    const latest = parseSyncTimestamp('9999-12-31T23:59:00+05:00');
    const earliest = parseSyncTimestamp('0000-01-01T00:00:00Z');
    expect(latest).toBe(Date.UTC(9999, 11, 31, 18, 59));
    expect(earliest).toBe(MIN_SYNC_TIMESTAMP);
    expect(formatSyncTimestamp(MAX_SYNC_TIMESTAMP)).toBe('9999-12-31T23:59:59.999Z');
    expect(parseSyncTimestamp(formatSyncTimestamp(MIN_SYNC_TIMESTAMP))).toBe(MIN_SYNC_TIMESTAMP);
  });

  it('formats as ISO-8601 UTC', () => {
    expect(formatSyncTimestamp(Date.UTC(2024, 4, 1, 10, 30))).toBe('2024-05-01T10:30:00.000Z');
  });
});
