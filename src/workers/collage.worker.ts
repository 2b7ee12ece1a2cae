import { Worker, type Job as BullJob } from 'bullmq';
import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { NotFoundError } from '../utils/errors.js';
import { sessionsController } from '../controllers/sessions.controller.js';
import { collagePipelineService } from '../services/collage-pipeline.service.js';
import { COLLAGE_QUEUE_NAME } from '../queues/collage.queue.js';
import { getRedisConnection } from '../queues/connection.js';
import { SessionStatus, type CollageJobData } from '../types/session.types.js';
import type { CollageSession } from '../db/schema.js';

const logger = createChildLogger({ service: 'collage-worker' });

let worker: Worker<CollageJobData> | null = null;

/**
 * Process collage job
 */
export async function processCollageJob(bullJob: Pick<BullJob<CollageJobData>, 'id' | 'data'>): Promise<void> {
  const { sessionId } = bullJob.data;

  logger.info({ sessionId, bullJobId: bullJob.id }, 'Processing collage job');

  let session: CollageSession;
  try {
    session = await sessionsController.getSession(sessionId);
  } catch (error) {
    // Cancelled while queued
    if (error instanceof NotFoundError) {
      logger.warn({ sessionId }, 'Session no longer exists, skipping');
      return;
    }
    throw error;
  }

  if (session.status !== SessionStatus.PROCESSING) {
    logger.info({ sessionId, status: session.status }, 'Session is not awaiting a render, skipping');
    return;
  }

  await collagePipelineService.run(session);
}

/**
 * Start collage worker
 */
export function startCollageWorker(): Worker<CollageJobData> {
  if (worker) {
    return worker;
  }

  const config = getConfig();

  worker = new Worker<CollageJobData>(COLLAGE_QUEUE_NAME, processCollageJob, {
    connection: getRedisConnection(),
    concurrency: config.worker.concurrency,
    removeOnComplete: { count: config.queue.completedCount },
    removeOnFail: { count: config.queue.failedCount },
  });

  worker.on('completed', (job) => {
    logger.info({ sessionId: job.data.sessionId, bullJobId: job.id }, 'Job completed');
  });

  worker.on('failed', (job, error) => {
    logger.error(
      {
        sessionId: job?.data.sessionId,
        bullJobId: job?.id,
        errorMessage: error.message,
        errorName: error.name,
      },
      'Job failed'
    );
  });

  worker.on('error', (error) => {
    logger.error({ error }, 'Worker error');
  });

  worker.on('stalled', (jobId) => {
    logger.warn({ jobId }, 'Job stalled');
  });

  logger.info({ queueName: COLLAGE_QUEUE_NAME, concurrency: config.worker.concurrency }, 'Collage worker started');

  return worker;
}

/**
 * Stop collage worker
 */
export async function stopCollageWorker(): Promise<void> {
  if (worker) {
    await worker.close();
    worker = null;
    logger.info('Collage worker stopped');
  }
}
