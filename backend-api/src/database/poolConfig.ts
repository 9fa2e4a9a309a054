import type { PoolConfig } from 'pg';

function intFrom(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  return value;
}

/** node-postgres pool settings from PG* / PGPOOL_* variables. */
export function poolConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PoolConfig {
  return {
    host: env.PGHOST ?? 'localhost',
    port: intFrom(env.PGPORT, 5432, 'PGPORT'),
    database: env.PGDATABASE ?? 'tripsync',
    user: env.PGUSER ?? 'postgres',
    password: env.PGPASSWORD ?? 'postgres',
    ssl: env.PGSSL === 'true' ? { rejectUnauthorized: false } : undefined,
    // Each sync cycle holds a connection for one statement at a time.
    max: intFrom(env.PGPOOL_MAX, 10, 'PGPOOL_MAX'),
    idleTimeoutMillis: intFrom(env.PGPOOL_IDLE_TIMEOUT_MS, 30_000, 'PGPOOL_IDLE_TIMEOUT_MS'),
    connectionTimeoutMillis: intFrom(env.PGPOOL_CONN_TIMEOUT_MS, 5_000, 'PGPOOL_CONN_TIMEOUT_MS'),
  };
}
