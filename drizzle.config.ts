import 'dotenv/config';
import type { Config } from 'drizzle-kit';

// Only the snapshot and prediction tables belong to this service; the migration ledger is
// maintained by src/db/migrate.ts.
export default {
  schema: './src/db/schema.ts',
  out: './drizzle',
  driver: 'pg',
  dbCredentials: {
    connectionString: process.env.DATABASE_URL ?? '',
  },
  tablesFilter: ['rating_snapshots', 'race_predictions'],
  strict: true,
} satisfies Config;
