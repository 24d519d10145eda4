import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { createPool } from '../infra/db/pool.js';
import { runMigrations } from '../infra/db/migrate.js';

dotenv.config();

async function migrate(): Promise<void> {
  const pool = createPool(loadConfig().databaseUrl);
  try {
    console.log('Starting migrations...');
    const applied = await runMigrations(pool);
    if (applied > 0) {
      console.log('All migrations applied successfully.');
    }
  } finally {
    await pool.end();
  }
}

migrate().catch((error: unknown) => {
  console.error('Migration failed:', error);
  process.exit(1);
});
