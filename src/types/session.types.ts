import { z } from 'zod';

/**
 * Session status enum
 */
export const SessionStatus = {
  AWAITING_IMAGE1: 'awaiting_image1',
  AWAITING_IMAGE2: 'awaiting_image2',
  PROCESSING: 'processing',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type SessionStatus = (typeof SessionStatus)[keyof typeof SessionStatus];

/**
 * Image slot: 1 = product close-up, 2 = colour variants
 */
export type ImageNum = 1 | 2;

/**
 * Create session request schema
 */
export const createSessionSchema = z.object({
  ownerId: z.string().min(1).max(255),
  channelId: z.string().max(255).optional(),
  threadRef: z.string().max(255).optional(),
});

export type CreateSessionRequest = z.infer<typeof createSessionSchema>;

/**
 * Process request schema
 */
export const processRequestSchema = z.object({
  sessionId: z.string().uuid(),
  backgroundName: z.string().min(1).max(255).optional(),
});

export type ProcessRequest = z.infer<typeof processRequestSchema>;

export const sessionIdParamsSchema = z.object({
  id: z.string().uuid(),
});

export const ownerParamsSchema = z.object({
  ownerId: z.string().min(1).max(255),
});

export const uploadParamsSchema = z.object({
  ownerId: z.string().min(1).max(255),
  imageNum: z.coerce.number().int(),
});

/**
 * Payload of a collage queue job
 */
export interface CollageJobData {
  sessionId: string;
}
