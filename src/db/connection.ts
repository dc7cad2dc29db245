import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { config } from '@api/config';
import * as schema from './schema/index';

export const pool = new pg.Pool({ connectionString: config.database.url });

pool.on('error', (err) => {
  console.error('[DB] Idle client error:', err.message);
});

export const db = drizzle(pool, { schema });

export type Database = typeof db;
