import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema.js';

const { Pool } = pg;

function createPool(databaseUrl: string): pg.Pool {
  return new Pool({
    connectionString: databaseUrl,
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });
}

function createDb(pool: pg.Pool) {
  return drizzle(pool, { schema });
}

export type Database = ReturnType<typeof createDb>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

/**
 * Open a pooled connection. The caller owns the handle and must close it.
 */
export function createDatabase(databaseUrl: string): DatabaseHandle {
  const pool = createPool(databaseUrl);
  let closed = false;

  return {
    db: createDb(pool),
    async close() {
      if (closed) return;
      closed = true;
      await pool.end();
    },
  };
}
