import 'dotenv/config';
import pg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';

import { logError } from '../utils/logger.js';
import { poolConfigFromEnv } from './poolConfig.js';

const { Pool } = pg;

export const pool = new Pool(poolConfigFromEnv());

// Idle-client errors are logged; the next query checks out a fresh client.
pool.on('error', (e) => logError('[db] idle client error', { message: e.message }));

export const db = drizzle(pool);

export type Database = typeof db;
