/**
 * Shared Image Utilities
 *
 * MIME type and extension mapping for the accepted upload formats.
 */

import { createChildLogger } from './logger.js';

const logger = createChildLogger({ service: 'image-utils' });

/**
 * Supported image MIME types
 */
export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/webp';

export const SUPPORTED_IMAGE_MIME_TYPES: readonly ImageMimeType[] = ['image/png', 'image/jpeg', 'image/webp'];

/**
 * Known image file extensions mapped to MIME types
 */
const EXTENSION_TO_MIME: Record<string, ImageMimeType> = {
  png: 'image/png',
  webp: 'image/webp',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
};

const MIME_TO_EXTENSION: Record<ImageMimeType, string> = {
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/webp': '.webp',
};

export const DEFAULT_IMAGE_EXTENSION = '.jpg';

export function isImageMimeType(value: string): value is ImageMimeType {
  return SUPPORTED_IMAGE_MIME_TYPES.some((type) => type === value);
}

/**
 * Get MIME type from file extension
 *
 * @param filePath - Path or object key of the image
 * @returns The appropriate MIME type for the image
 */
export function getImageMimeType(filePath: string): ImageMimeType {
  const ext = filePath.toLowerCase().split('.').pop() || '';
  const mimeType = EXTENSION_TO_MIME[ext];

  if (!mimeType) {
    logger.warn({ filePath, extension: ext }, 'Unknown image extension, defaulting to image/jpeg');
    return 'image/jpeg';
  }

  return mimeType;
}

/**
 * File extension (with dot) for a Content-Type header value. Parameters such as
 * `; charset=` are ignored; anything unsupported maps to `.jpg`.
 */
export function getImageExtension(contentType: string | undefined): string {
  const mime = (contentType ?? '').split(';')[0].trim().toLowerCase();
  return isImageMimeType(mime) ? MIME_TO_EXTENSION[mime] : DEFAULT_IMAGE_EXTENSION;
}

/**
 * Sniff the format from the leading bytes
 */
export function detectImageMimeType(buffer: Buffer): ImageMimeType | null {
  if (buffer.length >= 8 && buffer.readUInt32BE(0) === 0x89504e47) {
    return 'image/png';
  }
  if (buffer.length >= 3 && buffer[0] === 0xff && buffer[1] === 0xd8 && buffer[2] === 0xff) {
    return 'image/jpeg';
  }
  if (
    buffer.length >= 12 &&
    buffer.toString('ascii', 0, 4) === 'RIFF' &&
    buffer.toString('ascii', 8, 12) === 'WEBP'
  ) {
    return 'image/webp';
  }
  return null;
}
