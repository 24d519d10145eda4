import dotenv from 'dotenv';
import { loadConfig } from '../../config.js';
import { createPasswordHasher } from '../../domain/auth/password.js';
import { ensureAdminUser } from '../../application/auth/bootstrapAdmin.js';
import { createPool } from '../db/pool.js';
import { runMigrations } from '../db/migrate.js';
import { PgUnitOfWork } from '../db/pgUnitOfWork.js';
import { createApp } from './app.js';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl);

  // Tables are created at startup if absent
  await runMigrations(pool);

  const uow = new PgUnitOfWork(pool);
  const passwords = createPasswordHasher(config.passwordStorage);

  if (config.admin) {
    const outcome = await ensureAdminUser(uow, passwords, config.admin);
    if (outcome === 'created') {
      console.log(`Created admin user ${config.admin.email}`);
    }
  }

  const app = createApp({
    uow,
    passwords,
    denyPolicy: config.denyPolicy,
    rateLimitPerMinute: config.rateLimitPerMinute,
    ping: () => pool.query('SELECT 1'),
  });

  app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/healthz`);
    console.log(`API docs: http://localhost:${config.port}/docs`);
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
