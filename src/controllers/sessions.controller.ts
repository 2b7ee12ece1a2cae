import { and, desc, eq, inArray } from 'drizzle-orm';
import { getDatabase, schema } from '../db/index.js';
import { createChildLogger } from '../utils/logger.js';
import { NotFoundError, BadRequestError, ConflictError, ServiceUnavailableError } from '../utils/errors.js';
import { addCollageJob } from '../queues/collage.queue.js';
import { storageService } from '../services/storage.service.js';
import { backgroundTemplateService } from '../services/background-template.service.js';
import { getImageExtension } from '../utils/image-utils.js';
import {
  ACTIVE_STATUSES,
  AWAITING_STATUSES,
  processingBlocker,
  sourcesOf,
  statusAfterUpload,
} from '../utils/session-state.js';
import { SessionStatus, type CreateSessionRequest, type ImageNum } from '../types/session.types.js';
import type { CollageSession, NewCollageSession } from '../db/schema.js';

const logger = createChildLogger({ service: 'sessions-controller' });

export interface UploadOutcome {
  session: CollageSession;
  path: string;
}

export type SessionView = CollageSession & { outputUrl?: string };

function isImageNum(value: number): value is ImageNum {
  return value === 1 || value === 2;
}

/**
 * SessionsController - collage session lifecycle
 *
 * Every status change is a conditional UPDATE guarded on the statuses it may
 * leave from; a guard that matches no row means another request got there first.
 */
export class SessionsController {
  /**
   * Start a session, or hand back the owner's active one
   */
  async createSession(data: CreateSessionRequest): Promise<CollageSession> {
    const active = await this.getActiveSession(data.ownerId);
    if (active) {
      logger.info({ sessionId: active.id, ownerId: data.ownerId }, 'Returning existing active session');
      return active;
    }

    const db = getDatabase();
    const [session] = await db
      .insert(schema.collageSessions)
      .values({
        ownerId: data.ownerId,
        channelId: data.channelId,
        threadRef: data.threadRef,
        status: SessionStatus.AWAITING_IMAGE1,
      } satisfies NewCollageSession)
      .returning();

    logger.info({ sessionId: session.id, ownerId: data.ownerId }, 'Session created');
    return session;
  }

  /**
   * Newest non-terminal session of an owner
   */
  async getActiveSession(ownerId: string): Promise<CollageSession | null> {
    return this.findNewest(ownerId, ACTIVE_STATUSES);
  }

  async getSession(sessionId: string): Promise<CollageSession> {
    const db = getDatabase();

    const [session] = await db
      .select()
      .from(schema.collageSessions)
      .where(eq(schema.collageSessions.id, sessionId))
      .limit(1);

    if (!session) {
      throw new NotFoundError(`Session ${sessionId} not found`);
    }

    return session;
  }

  /**
   * Session with a download link once the collage exists
   */
  async getSessionView(sessionId: string): Promise<SessionView> {
    const session = await this.getSession(sessionId);
    if (session.status !== SessionStatus.COMPLETED || !session.outputPath) {
      return session;
    }
    return { ...session, outputUrl: await storageService.getPresignedUrl(session.outputPath) };
  }

  async getOutputUrl(sessionId: string): Promise<string> {
    const session = await this.getSession(sessionId);
    if (session.status !== SessionStatus.COMPLETED || !session.outputPath) {
      throw new NotFoundError(`Session ${sessionId} has no output (status: ${session.status})`);
    }
    return storageService.getPresignedUrl(session.outputPath);
  }

  /**
   * Store image 1 (product) or image 2 (variants) on the owner's awaiting session
   */
  async uploadImage(ownerId: string, imageNum: number, buffer: Buffer, contentType: string): Promise<UploadOutcome> {
    if (!isImageNum(imageNum)) {
      throw new BadRequestError('imageNum must be 1 or 2');
    }

    const session = await this.findNewest(ownerId, AWAITING_STATUSES);
    if (!session) {
      throw new NotFoundError(`No session awaiting images for owner ${ownerId}`);
    }

    // Fresh key per upload; an object a render may be reading is never overwritten
    const key = storageService.getInputKey(session.id, imageNum, getImageExtension(contentType));
    await storageService.uploadBuffer(buffer, key, contentType);

    const db = getDatabase();
    const [updated] = await db
      .update(schema.collageSessions)
      .set({
        ...(imageNum === 1 ? { image1Path: key } : { image2Path: key }),
        status: statusAfterUpload(session.status, imageNum),
        updatedAt: new Date(),
      })
      .where(and(eq(schema.collageSessions.id, session.id), eq(schema.collageSessions.status, session.status)))
      .returning();

    if (!updated) {
      await this.deleteQuietly(session.id, key);
      throw new ConflictError(`Session ${session.id} changed during upload`);
    }

    const replaced = imageNum === 1 ? session.image1Path : session.image2Path;
    if (replaced && replaced !== key) {
      await this.deleteQuietly(session.id, replaced);
    }

    logger.info({ sessionId: session.id, imageNum, key, status: updated.status }, 'Image uploaded');
    return { session: updated, path: key };
  }

  /**
   * Move a session with both images to processing and enqueue the render
   */
  async requestProcessing(sessionId: string, backgroundName?: string): Promise<CollageSession> {
    const session = await this.getSession(sessionId);

    const blocker = processingBlocker(session);
    if (blocker) {
      throw blocker.reason === 'missing_images'
        ? new BadRequestError(blocker.message)
        : new ConflictError(blocker.message);
    }

    const template = await backgroundTemplateService.resolveAvailableName(backgroundName);

    const db = getDatabase();
    const [updated] = await db
      .update(schema.collageSessions)
      .set({
        status: SessionStatus.PROCESSING,
        backgroundName: template,
        errorMessage: null,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(schema.collageSessions.id, sessionId),
          inArray(schema.collageSessions.status, sourcesOf(SessionStatus.PROCESSING))
        )
      )
      .returning();

    if (!updated) {
      throw new ConflictError(`Session ${sessionId} is already being processed`);
    }

    try {
      await addCollageJob(sessionId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ sessionId, error: message }, 'Failed to enqueue collage job');
      await this.markFailed(sessionId, `Could not queue processing: ${message}`);
      throw new ServiceUnavailableError(`Could not queue processing: ${message}`);
    }

    logger.info({ sessionId, backgroundName: template }, 'Processing requested');
    return updated;
  }

  /**
   * Delete a session and, best-effort, its stored files
   */
  async cancelSession(sessionId: string): Promise<void> {
    const session = await this.getSession(sessionId);
    const db = getDatabase();

    await db.delete(schema.collageSessions).where(eq(schema.collageSessions.id, sessionId));

    const keys = [session.image1Path, session.image2Path, session.outputPath].filter(
      (key): key is string => !!key
    );
    for (const key of keys) {
      await this.deleteQuietly(sessionId, key);
    }

    logger.info({ sessionId, status: session.status }, 'Session cancelled');
  }

  async markCompleted(sessionId: string, outputPath: string, overlayName: string): Promise<CollageSession> {
    const db = getDatabase();
    const [updated] = await db
      .update(schema.collageSessions)
      .set({
        status: SessionStatus.COMPLETED,
        outputPath,
        overlayColor: overlayName,
        errorMessage: null,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(schema.collageSessions.id, sessionId),
          inArray(schema.collageSessions.status, sourcesOf(SessionStatus.COMPLETED))
        )
      )
      .returning();

    if (!updated) {
      throw new ConflictError(`Session ${sessionId} is no longer processing`);
    }

    logger.info({ sessionId, outputPath, overlayName }, 'Session completed');
    return updated;
  }

  /**
   * Record a failure. Returns null when the session is gone or already terminal.
   */
  async markFailed(sessionId: string, message: string): Promise<CollageSession | null> {
    const db = getDatabase();
    const [updated] = await db
      .update(schema.collageSessions)
      .set({
        status: SessionStatus.FAILED,
        errorMessage: message,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(schema.collageSessions.id, sessionId),
          inArray(schema.collageSessions.status, sourcesOf(SessionStatus.FAILED))
        )
      )
      .returning();

    if (!updated) {
      logger.warn({ sessionId, message }, 'Session not marked failed: missing or already terminal');
      return null;
    }

    logger.info({ sessionId, message }, 'Session failed');
    return updated;
  }

  private async deleteQuietly(sessionId: string, key: string): Promise<void> {
    try {
      await storageService.deleteFile(key);
    } catch (error) {
      logger.warn({ sessionId, key, error }, 'Failed to delete stored file, may be orphaned');
    }
  }

  private async findNewest(ownerId: string, statuses: readonly SessionStatus[]): Promise<CollageSession | null> {
    const db = getDatabase();

    const [session] = await db
      .select()
      .from(schema.collageSessions)
      .where(
        and(eq(schema.collageSessions.ownerId, ownerId), inArray(schema.collageSessions.status, [...statuses]))
      )
      .orderBy(desc(schema.collageSessions.createdAt))
      .limit(1);

    return session ?? null;
  }
}

export const sessionsController = new SessionsController();
