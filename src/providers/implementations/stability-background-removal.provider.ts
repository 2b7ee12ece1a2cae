/**
 * Stability AI Background Removal Provider
 *
 * Uses Stability AI's v2beta remove-background API for background removal.
 *
 * API Reference: https://platform.stability.ai/docs/api-reference#tag/Edit/paths/~1v2beta~1stable-image~1edit~1remove-background/post
 */

import sharp from 'sharp';

import { createChildLogger } from '../../utils/logger.js';
import { ExternalApiError } from '../../utils/errors.js';
import { getConfig } from '../../config/index.js';
import { detectImageMimeType, getImageExtension } from '../../utils/image-utils.js';
import { readBuffer, requestWithRetry } from '../utils/api-request.js';
import type {
  BackgroundRemovalProvider,
  BackgroundRemovalOptions,
} from '../interfaces/background-removal.provider.js';

const logger = createChildLogger({ service: 'stability-bg-removal' });

const SERVICE = 'Stability';

/**
 * Stability AI API constants
 */
export const STABILITY_CONSTANTS = {
  /** v2beta remove-background endpoint */
  REMOVE_BG_ENDPOINT: '/v2beta/stable-image/edit/remove-background',
  /** Maximum payload size (10MB with some margin for multipart overhead) */
  MAX_PAYLOAD_BYTES: 9 * 1024 * 1024,
  /** Target width for resizing large images */
  RESIZE_TARGET_WIDTH: 2048,
  /** Smallest width tried before giving up on shrinking */
  MIN_RESIZE_WIDTH: 512,
} as const;

export class StabilityBackgroundRemovalProvider implements BackgroundRemovalProvider {
  readonly providerId = 'stability';

  async removeBackground(image: Buffer, options: BackgroundRemovalOptions = {}): Promise<Buffer> {
    const config = getConfig();
    const apiKey = config.apis.stability;

    if (!apiKey) {
      throw new ExternalApiError(SERVICE, 'API key not configured (STABILITY_API_KEY)');
    }

    logger.info({ requestId: options.requestId, bytes: image.length }, 'Removing background with Stability AI');

    let upload = image;
    let mimeType = options.mimeType ?? detectImageMimeType(image) ?? 'image/png';

    // Stability rejects bodies over 10MB
    if (image.length > STABILITY_CONSTANTS.MAX_PAYLOAD_BYTES) {
      upload = await this.resizeImageForUpload(image);
      mimeType = 'image/jpeg';
      logger.info(
        {
          originalSize: image.length,
          newSize: upload.length,
          reduction: `${Math.round((1 - upload.length / image.length) * 100)}%`,
        },
        'Image too large, resized before upload'
      );
    }

    const formData = new FormData();
    formData.append(
      'image',
      new Blob([new Uint8Array(upload)], { type: mimeType }),
      `upload${getImageExtension(mimeType)}`
    );
    formData.append('output_format', 'png');

    const response = await requestWithRetry({
      service: SERVICE,
      url: `${config.apis.stabilityBase}${STABILITY_CONSTANTS.REMOVE_BG_ENDPOINT}`,
      init: {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          Accept: 'image/*',
        },
        body: formData,
      },
      retryDelayMs: config.backgroundRemoval.retryDelayMs,
      operationName: 'stability-remove-bg',
    });

    let result = await readBuffer(response);
    if (upload !== image) {
      result = await this.restoreDimensions(result, image);
    }

    logger.info(
      { requestId: options.requestId, size: result.length },
      'Background removed successfully with Stability AI'
    );

    return result;
  }

  /**
   * Progressive JPEG downscale until the payload fits
   */
  private async resizeImageForUpload(image: Buffer): Promise<Buffer> {
    let current = image;
    let width: number = STABILITY_CONSTANTS.RESIZE_TARGET_WIDTH;

    while (current.length > STABILITY_CONSTANTS.MAX_PAYLOAD_BYTES && width >= STABILITY_CONSTANTS.MIN_RESIZE_WIDTH) {
      current = await sharp(image)
        .resize(width, null, { fit: 'inside', withoutEnlargement: true })
        .jpeg({ quality: 85 })
        .toBuffer();
      width = Math.floor(width * 0.75);
    }

    return current;
  }

  /**
   * Callers expect the cutout at the input's pixel size
   */
  private async restoreDimensions(result: Buffer, original: Buffer): Promise<Buffer> {
    const { width, height } = await sharp(original).metadata();
    if (!width || !height) {
      throw new ExternalApiError(SERVICE, 'Could not read input dimensions');
    }
    return sharp(result)
      .resize(width, height, { fit: 'fill', kernel: 'lanczos3' })
      .ensureAlpha()
      .png()
      .toBuffer();
  }

  isAvailable(): boolean {
    try {
      const config = getConfig();
      return !!config.apis.stability;
    } catch {
      return false;
    }
  }
}

export const stabilityBackgroundRemovalProvider = new StabilityBackgroundRemovalProvider();
