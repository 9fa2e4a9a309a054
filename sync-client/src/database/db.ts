import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';

const LOCAL_SCHEMA_PATH = fileURLToPath(new URL('../../sql/local_schema.sql', import.meta.url));

export type LocalDatabase = BetterSQLite3Database;

export function openLocalDatabase(dbPath: string) {
  const sqlite = new Database(dbPath);
  if (dbPath !== ':memory:') sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.exec(readFileSync(LOCAL_SCHEMA_PATH, 'utf8'));
  const db: LocalDatabase = drizzle(sqlite);
  return { sqlite, db };
}
