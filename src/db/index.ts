import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema.js';
import { getConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'database' });

export type Database = NodePgDatabase<typeof schema>;

/**
 * Startup connection policy: exponential backoff, capped
 */
export const CONNECT_POLICY = {
  attempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
} as const;

let db: Database | null = null;
let pool: pg.Pool | null = null;

export function connectDelay(attempt: number): number {
  return Math.min(CONNECT_POLICY.baseDelayMs * 2 ** (attempt - 1), CONNECT_POLICY.maxDelayMs);
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function waitForPool(target: pg.Pool): Promise<void> {
  for (let attempt = 1; ; attempt++) {
    try {
      const client = await target.connect();
      client.release();
      logger.info({ attempt }, 'Database connection established');
      return;
    } catch (error) {
      if (attempt >= CONNECT_POLICY.attempts) {
        logger.error({ attempts: attempt, error: errorText(error) }, 'Database unreachable, giving up');
        throw error instanceof Error ? error : new Error(`Database connection failed: ${errorText(error)}`);
      }
      const delayMs = connectDelay(attempt);
      logger.warn({ attempt, delayMs, error: errorText(error) }, 'Database connection failed, retrying');
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
}

/**
 * Open the session store pool and wait until PostgreSQL answers
 */
export async function initDatabase(): Promise<Database> {
  if (db) {
    return db;
  }

  const { database } = getConfig();
  const created = new pg.Pool({
    connectionString: database.url,
    max: database.poolMax,
    idleTimeoutMillis: database.poolIdleTimeoutMs,
    connectionTimeoutMillis: database.poolConnectionTimeoutMs,
  });

  try {
    await waitForPool(created);
  } catch (error) {
    await created.end();
    throw error;
  }

  pool = created;
  db = drizzle(created, { schema });
  return db;
}

export function getDatabase(): Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Readiness check; false when the pool is closed or SELECT 1 fails
 */
export async function pingDatabase(): Promise<boolean> {
  if (!pool) {
    return false;
  }
  let client: pg.PoolClient | undefined;
  try {
    client = await pool.connect();
    await client.query('SELECT 1');
    return true;
  } catch (error) {
    logger.warn({ error: errorText(error) }, 'Database ping failed');
    return false;
  } finally {
    client?.release();
  }
}

export async function closeDatabase(): Promise<void> {
  if (!pool) {
    return;
  }
  const closing = pool;
  pool = null;
  db = null;
  await closing.end();
  logger.info('Database pool closed');
}

export { schema };
