/**
 * Session lifecycle rules.
 *
 * awaiting_image1 -> awaiting_image2 -> processing -> completed, and any
 * non-terminal state -> failed. completed and failed are terminal.
 */

import { SessionStatus } from '../types/session.types.js';

const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  [SessionStatus.AWAITING_IMAGE1]: [SessionStatus.AWAITING_IMAGE2, SessionStatus.FAILED],
  [SessionStatus.AWAITING_IMAGE2]: [SessionStatus.PROCESSING, SessionStatus.FAILED],
  [SessionStatus.PROCESSING]: [SessionStatus.COMPLETED, SessionStatus.FAILED],
  [SessionStatus.COMPLETED]: [],
  [SessionStatus.FAILED]: [],
};

export const ACTIVE_STATUSES: readonly SessionStatus[] = [
  SessionStatus.AWAITING_IMAGE1,
  SessionStatus.AWAITING_IMAGE2,
  SessionStatus.PROCESSING,
];

export const AWAITING_STATUSES: readonly SessionStatus[] = [
  SessionStatus.AWAITING_IMAGE1,
  SessionStatus.AWAITING_IMAGE2,
];

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: SessionStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * Statuses from which `to` is reachable in one step; used as the optimistic
 * guard of a conditional UPDATE.
 */
export function sourcesOf(to: SessionStatus): SessionStatus[] {
  return ACTIVE_STATUSES.filter((from) => canTransition(from, to));
}

/**
 * Status after storing an upload. Image 1 advances the first step; image 2 never moves it.
 */
export function statusAfterUpload(current: SessionStatus, imageNum: 1 | 2): SessionStatus {
  if (imageNum === 1 && current === SessionStatus.AWAITING_IMAGE1) {
    return SessionStatus.AWAITING_IMAGE2;
  }
  return current;
}

export interface ProcessableSession {
  status: SessionStatus;
  image1Path: string | null;
  image2Path: string | null;
}

export interface ProcessingBlocker {
  reason: 'missing_images' | 'invalid_status';
  message: string;
}

/**
 * Why a session cannot be processed yet, or null when it can
 */
export function processingBlocker(session: ProcessableSession): ProcessingBlocker | null {
  if (!session.image1Path || !session.image2Path) {
    const missing = [!session.image1Path && 'image 1', !session.image2Path && 'image 2'].filter(Boolean);
    return { reason: 'missing_images', message: `Session is missing ${missing.join(' and ')}` };
  }
  if (!canTransition(session.status, SessionStatus.PROCESSING)) {
    return { reason: 'invalid_status', message: `Session cannot be processed from status ${session.status}` };
  }
  return null;
}
