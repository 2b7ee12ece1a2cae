/**
 * Image Utils Tests
 */

import { describe, it, expect, vi } from 'vitest';

// Mock logger before importing modules that use it
vi.mock('./logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import {
  getImageMimeType,
  getImageExtension,
  isImageMimeType,
  detectImageMimeType,
} from './image-utils.js';

describe('image-utils', () => {
  describe('getImageMimeType', () => {
    it('should return image/png for .png files', () => {
      expect(getImageMimeType('inputs/abc_1.png')).toBe('image/png');
      expect(getImageMimeType('/path/to/image.PNG')).toBe('image/png');
    });

    it('should return image/jpeg for .jpg and .jpeg files', () => {
      expect(getImageMimeType('/path/to/image.jpg')).toBe('image/jpeg');
      expect(getImageMimeType('/path/to/image.JPEG')).toBe('image/jpeg');
    });

    it('should return image/webp for .webp files', () => {
      expect(getImageMimeType('/path/to/image.webp')).toBe('image/webp');
    });

    it('should default to image/jpeg for unknown extensions', () => {
      expect(getImageMimeType('/path/to/image.bmp')).toBe('image/jpeg');
      expect(getImageMimeType('/path/to/image')).toBe('image/jpeg');
    });
  });

  describe('getImageExtension', () => {
    it('should map supported content types', () => {
      expect(getImageExtension('image/png')).toBe('.png');
      expect(getImageExtension('image/jpeg')).toBe('.jpg');
      expect(getImageExtension('image/webp')).toBe('.webp');
    });

    it('should ignore parameters and case', () => {
      expect(getImageExtension('Image/PNG; charset=binary')).toBe('.png');
    });

    it('should default to .jpg', () => {
      expect(getImageExtension('image/gif')).toBe('.jpg');
      expect(getImageExtension(undefined)).toBe('.jpg');
    });
  });

  describe('isImageMimeType', () => {
    it('should accept only the supported types', () => {
      expect(isImageMimeType('image/webp')).toBe(true);
      expect(isImageMimeType('image/gif')).toBe(false);
    });
  });

  describe('detectImageMimeType', () => {
    it('should recognise PNG, JPEG and WebP signatures', () => {
      expect(detectImageMimeType(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))).toBe('image/png');
      expect(detectImageMimeType(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe('image/jpeg');
      expect(detectImageMimeType(Buffer.from('RIFF\x00\x00\x00\x00WEBPVP8 ', 'latin1'))).toBe('image/webp');
    });

    it('should return null for anything else', () => {
      expect(detectImageMimeType(Buffer.from('hello world'))).toBeNull();
      expect(detectImageMimeType(Buffer.alloc(0))).toBeNull();
    });
  });
});
