import { Queue, type JobsOptions } from 'bullmq';
import { getRedisConnection } from './connection.js';
import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import type { CollageJobData } from '../types/session.types.js';

const logger = createChildLogger({ service: 'collage-queue' });

export const COLLAGE_QUEUE_NAME = 'collage';

let queue: Queue<CollageJobData> | null = null;

/**
 * Initialize collage queue
 */
export function initCollageQueue(): Queue<CollageJobData> {
  if (queue) {
    return queue;
  }

  const connection = getRedisConnection();
  const config = getConfig();

  queue = new Queue<CollageJobData>(COLLAGE_QUEUE_NAME, {
    connection,
    defaultJobOptions: {
      // Removal retries live in the providers; a failed render marks the session failed
      attempts: 1,
      removeOnComplete: {
        count: config.queue.completedCount,
        age: config.queue.completedAgeSeconds,
      },
      removeOnFail: {
        count: config.queue.failedCount,
        age: config.queue.failedAgeSeconds,
      },
    },
  });

  logger.info({ queueName: COLLAGE_QUEUE_NAME }, 'Collage queue initialized');

  return queue;
}

/**
 * Add a session to the collage queue
 */
export async function addCollageJob(sessionId: string, options: JobsOptions = {}): Promise<void> {
  const q = initCollageQueue();

  await q.add(
    'render',
    { sessionId },
    {
      jobId: sessionId, // Session ID doubles as BullMQ job ID for deduplication
      ...options,
    }
  );

  logger.info({ sessionId }, 'Session added to collage queue');
}

/**
 * Close collage queue
 */
export async function closeCollageQueue(): Promise<void> {
  if (queue) {
    await queue.close();
    queue = null;
    logger.info('Collage queue closed');
  }
}
