import 'dotenv/config';
import { readFileSync, readdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool, PoolClient } from 'pg';

import { loadDatabaseConfig } from '../config.js';
import type { DatabaseConfig } from '../config.js';
import { closePool, getPool } from './client.js';

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'drizzle');
const MIGRATIONS_TABLE = '__race_ratings_migrations';

const ensureTableSQL = `
CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
  id SERIAL PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

// Linear back-off until Postgres accepts connections.
const connectWithRetry = async (pool: Pool, config: DatabaseConfig): Promise<PoolClient> => {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await pool.connect();
    } catch (err) {
      if (attempt >= config.migrateRetries) throw err;
      const delayMs = config.migrateRetryDelayMs * attempt;
      console.warn('db_connect_retry', {
        attempt,
        attempts: config.migrateRetries,
        delayMs,
        message: err instanceof Error ? err.message : String(err),
      });
      await sleep(delayMs);
    }
  }
};

async function main() {
  const client = await connectWithRetry(getPool(), loadDatabaseConfig());
  try {
    await client.query(ensureTableSQL);

    const result = await client.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE} ORDER BY name`);
    const applied = new Set(result.rows.map((row) => row.name));

    const pending = readdirSync(MIGRATIONS_DIR)
      .filter((file) => file.endsWith('.sql') && !applied.has(file))
      .sort();

    for (const file of pending) {
      const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf8');
      console.info('migration_applying', { file });
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [file]);
        await client.query('COMMIT');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    }

    const snapshots = await client.query<{ events: string; rows: string; latest: Date | null }>(
      'SELECT count(DISTINCT event_id) AS events, count(*) AS rows, max(effective_at) AS latest FROM rating_snapshots'
    );
    const stored = snapshots.rows[0];
    console.info('migrations_up_to_date', {
      applied: pending.length,
      ratedEvents: Number(stored?.events ?? 0),
      snapshots: Number(stored?.rows ?? 0),
      ratedUntil: stored?.latest ? stored.latest.toISOString() : null,
    });
  } finally {
    client.release();
  }
}

main()
  .catch((err) => {
    console.error('migrate_failed', err);
    process.exitCode = 1;
  })
  .finally(async () => {
    try {
      await closePool();
    } catch (err) {
      console.error('db_close_failed', err);
    }
  });
