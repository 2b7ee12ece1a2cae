import { describe, it, expect } from 'vitest';
import {
  canTransition,
  isTerminal,
  sourcesOf,
  statusAfterUpload,
  processingBlocker,
} from './session-state.js';
import { SessionStatus } from '../types/session.types.js';

describe('session-state', () => {
  describe('canTransition', () => {
    it('should allow the forward path', () => {
      expect(canTransition('awaiting_image1', 'awaiting_image2')).toBe(true);
      expect(canTransition('awaiting_image2', 'processing')).toBe(true);
      expect(canTransition('processing', 'completed')).toBe(true);
    });

    it('should allow failing from any active state', () => {
      expect(canTransition('awaiting_image1', 'failed')).toBe(true);
      expect(canTransition('awaiting_image2', 'failed')).toBe(true);
      expect(canTransition('processing', 'failed')).toBe(true);
    });

    it('should reject skips and backward moves', () => {
      expect(canTransition('awaiting_image1', 'processing')).toBe(false);
      expect(canTransition('processing', 'awaiting_image2')).toBe(false);
      expect(canTransition('awaiting_image2', 'completed')).toBe(false);
    });

    it('should reject leaving terminal states', () => {
      expect(canTransition('completed', 'failed')).toBe(false);
      expect(canTransition('failed', 'processing')).toBe(false);
    });
  });

  describe('isTerminal', () => {
    it('should mark completed and failed as terminal', () => {
      expect(isTerminal('completed')).toBe(true);
      expect(isTerminal('failed')).toBe(true);
      expect(isTerminal('processing')).toBe(false);
    });
  });

  describe('sourcesOf', () => {
    it('should list the guard statuses for each target', () => {
      expect(sourcesOf(SessionStatus.PROCESSING)).toEqual(['awaiting_image2']);
      expect(sourcesOf(SessionStatus.COMPLETED)).toEqual(['processing']);
      expect(sourcesOf(SessionStatus.FAILED)).toEqual(['awaiting_image1', 'awaiting_image2', 'processing']);
    });
  });

  describe('statusAfterUpload', () => {
    it('should advance on the first image', () => {
      expect(statusAfterUpload('awaiting_image1', 1)).toBe('awaiting_image2');
    });

    it('should leave the status alone for image 2 and re-uploads', () => {
      expect(statusAfterUpload('awaiting_image1', 2)).toBe('awaiting_image1');
      expect(statusAfterUpload('awaiting_image2', 2)).toBe('awaiting_image2');
      expect(statusAfterUpload('awaiting_image2', 1)).toBe('awaiting_image2');
    });
  });

  describe('processingBlocker', () => {
    it('should accept a session with both images awaiting processing', () => {
      expect(
        processingBlocker({ status: 'awaiting_image2', image1Path: 'inputs/a_1.jpg', image2Path: 'inputs/a_2.jpg' })
      ).toBeNull();
    });

    it('should name the missing images', () => {
      expect(processingBlocker({ status: 'awaiting_image1', image1Path: null, image2Path: null })).toEqual({
        reason: 'missing_images',
        message: 'Session is missing image 1 and image 2',
      });
      expect(processingBlocker({ status: 'awaiting_image2', image1Path: 'inputs/a_1.jpg', image2Path: null })).toEqual({
        reason: 'missing_images',
        message: 'Session is missing image 2',
      });
    });

    it('should reject sessions already past the upload stage', () => {
      expect(
        processingBlocker({ status: 'processing', image1Path: 'inputs/a_1.jpg', image2Path: 'inputs/a_2.jpg' })
      ).toEqual({
        reason: 'invalid_status',
        message: 'Session cannot be processed from status processing',
      });
    });
  });
});
