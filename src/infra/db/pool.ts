import pg from 'pg';
import type { Pool as PgPool } from 'pg';

const { Pool, types } = pg;

// Keep DATE columns as the 'YYYY-MM-DD' text Postgres sends instead of
// local-midnight Date objects.
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

export type DbPool = PgPool;

export function createPool(connectionString: string): DbPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return pool;
}
