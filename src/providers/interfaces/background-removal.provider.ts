import type { ImageMimeType } from '../../utils/image-utils.js';

/**
 * Options for background removal
 */
export interface BackgroundRemovalOptions {
  /** Input format; sniffed from the bytes when omitted */
  mimeType?: ImageMimeType;
  /** Correlation id for logs (usually the session id) */
  requestId?: string;
}

/**
 * BackgroundRemovalProvider Interface
 *
 * Implementations: ReplicateBackgroundRemovalProvider, StabilityBackgroundRemovalProvider
 *
 * Takes an encoded image and returns a PNG with the background made transparent,
 * at the input's pixel dimensions. Failures are thrown as ExternalApiError.
 */
export interface BackgroundRemovalProvider {
  /** Provider identifier for logging/metrics */
  readonly providerId: string;

  removeBackground(image: Buffer, options?: BackgroundRemovalOptions): Promise<Buffer>;

  /**
   * Check if provider is available/configured
   */
  isAvailable(): boolean;
}
