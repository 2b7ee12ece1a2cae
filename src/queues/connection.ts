import { Redis, type RedisOptions } from 'ioredis';
import { getConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import { ServiceUnavailableError } from '../utils/errors.js';

const logger = createChildLogger({ service: 'redis' });

/** Reconnect attempts before ioredis gives up */
export const MAX_RECONNECT_ATTEMPTS = 10;

export type ConnectionRole = 'api' | 'worker';

let connection: Redis | null = null;

/**
 * Reconnect delay for attempt n, or null to stop
 */
export function reconnectDelay(times: number): number | null {
  if (times > MAX_RECONNECT_ATTEMPTS) {
    return null;
  }
  return Math.min(times * 100, 3000);
}

export function redisOptions(role: ConnectionRole): RedisOptions {
  return {
    connectionName: `collage-${role}`,
    // BullMQ blocks on this connection; it rejects a per-request retry limit
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    retryStrategy: (times: number) => {
      const delay = reconnectDelay(times);
      if (delay === null) {
        logger.error({ role, attempts: times }, 'Redis reconnect attempts exhausted');
      }
      return delay;
    },
  };
}

/**
 * Open the process-wide connection shared by the collage queue and worker
 */
export function openRedisConnection(role: ConnectionRole): Redis {
  if (connection) {
    return connection;
  }

  const redis = new Redis(getConfig().redis.url, redisOptions(role));
  redis.on('ready', () => logger.info({ role }, 'Redis ready'));
  redis.on('error', (error: Error) => logger.error({ role, error: error.message }, 'Redis connection error'));
  redis.on('close', () => logger.warn({ role }, 'Redis connection closed'));

  connection = redis;
  return redis;
}

export function getRedisConnection(): Redis {
  if (!connection) {
    throw new ServiceUnavailableError('Redis not initialized');
  }
  return connection;
}

/**
 * Readiness check; false when no connection is open or PING fails
 */
export async function pingRedis(): Promise<boolean> {
  if (!connection) {
    return false;
  }
  try {
    return (await connection.ping()) === 'PONG';
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Redis ping failed');
    return false;
  }
}

export async function closeRedisConnection(): Promise<void> {
  if (!connection) {
    return;
  }
  const redis = connection;
  connection = null;
  await redis.quit();
  logger.info('Redis connection closed');
}
