import { Pool } from 'pg';
import { Kysely, PostgresDialect, sql } from 'kysely';
import type { Database } from './db/types.js';
import { DATABASE_URL, DB_POOL_MAX, DB_SSL, DB_SSL_REJECT_UNAUTHORIZED } from './config.js';

/** One pool for the whole process. Null when DATABASE_URL is unset. */
const sharedPool = DATABASE_URL
  ? new Pool({
      connectionString: DATABASE_URL,
      ssl: DB_SSL ? { rejectUnauthorized: DB_SSL_REJECT_UNAUTHORIZED } : undefined,
      max: DB_POOL_MAX,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
      statement_timeout: 30000,
    })
  : null;

if (sharedPool) {
  sharedPool.on('error', (err) => {
    console.error('[db] unexpected idle client error:', err instanceof Error ? err.message : String(err));
  });
}

export const db = sharedPool
  ? new Kysely<Database>({
      dialect: new PostgresDialect({
        pool: sharedPool,
      }),
    })
  : null;

export function getPoolStats(): { total: number; idle: number; waiting: number; max: number } | null {
  if (!sharedPool) return null;
  return {
    total: sharedPool.totalCount,
    idle: sharedPool.idleCount,
    waiting: sharedPool.waitingCount,
    max: DB_POOL_MAX,
  };
}

export async function pingDatabase(database: Kysely<Database>): Promise<void> {
  await sql`SELECT 1`.execute(database);
}

export async function closeDatabase(): Promise<void> {
  if (db) await db.destroy();
}
