/**
 * config/database.ts — PostgreSQL connection via Drizzle ORM
 *
 * Optional: only used when ENABLE_DB=true, to persist each published
 * canonical table and the ingestion audit trail.
 */
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { env } from './env.ts';
import * as schema from '../db/schema.ts';
import { childLogger } from '../shared/logger.ts';

const { Pool } = pg;
const log = childLogger({ module: 'db' });

export type Database = NodePgDatabase<typeof schema>;

let pool: pg.Pool | null = null;
let db: Database | null = null;

function createPool(): pg.Pool {
  if (!env.ENABLE_DB) {
    throw new Error('Database is disabled (ENABLE_DB=false)');
  }
  const p = new Pool({
    connectionString: env.DATABASE_URL,
    min: env.DB_POOL_MIN,
    max: env.DB_POOL_MAX,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : false,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
  p.on('error', (err: Error) => log.error({ err }, 'Unexpected pool error'));
  return p;
}

/**
 * Get the raw pg Pool (health checks, direct queries).
 */
export function getPool(): pg.Pool {
  if (!pool) pool = createPool();
  return pool;
}

/**
 * Get or create the Drizzle client. Safe to call multiple times.
 */
export function getDb(): Database {
  if (!db) db = drizzle(getPool(), { schema });
  return db;
}

/**
 * Check database connectivity. Returns latency in ms or throws.
 */
export async function pingDb(): Promise<number> {
  const start = Date.now();
  const client = await getPool().connect();
  try {
    await client.query('SELECT 1');
    return Date.now() - start;
  } finally {
    client.release();
  }
}

/**
 * Gracefully close the pool. Call on shutdown.
 */
export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
    log.info('Connection pool closed');
  }
}
