export type SyncEngineOptions = {
  /** Upper bound for a single entity store call. */
  storeTimeoutMs: number;
  /** Compare-and-swap attempts per record before giving up on it. */
  maxWriteAttempts: number;
};

function envInt(name: string, fallback: number, min: number): number {
  const raw = Number(process.env[name] ?? NaN);
  if (!Number.isFinite(raw)) return fallback;
  return Math.max(min, Math.floor(raw));
}

export function syncEngineOptionsFromEnv(): SyncEngineOptions {
  return {
    storeTimeoutMs: envInt('TRIPSYNC_SYNC_STORE_TIMEOUT_MS', 10_000, 100),
    maxWriteAttempts: envInt('TRIPSYNC_SYNC_MAX_WRITE_ATTEMPTS', 3, 1),
  };
}
