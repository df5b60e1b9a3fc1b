import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';

import { loadDatabaseConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

let pool: Pool | undefined;
let db: Database | undefined;

export const getPool = () => {
  if (!pool) {
    const { url } = loadDatabaseConfig();
    if (!url) throw new ConfigurationError('DATABASE_URL is not set; snapshots need Postgres here');
    pool = new Pool({ connectionString: url });
  }
  return pool;
};

export const getDb = (): Database => {
  if (!db) db = drizzle(getPool(), { schema });
  return db;
};

export const closePool = async () => {
  const current = pool;
  pool = undefined;
  db = undefined;
  if (current) await current.end();
};
