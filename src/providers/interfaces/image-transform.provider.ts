import type { RawImage, Size } from '../../types/collage.types.js';

/**
 * Channel layout requested when decoding to raw pixels
 */
export type RawChannels = 3 | 4;

/**
 * ImageTransformProvider Interface
 *
 * Implementations: SharpImageTransformProvider
 *
 * Decoding, geometric fitting and pixel access for the compositor.
 * Undecodable input is reported as InvalidImageError.
 */
export interface ImageTransformProvider {
  /** Provider identifier for logging/metrics */
  readonly providerId: string;

  /**
   * Get image dimensions
   */
  getDimensions(input: Buffer): Promise<Size>;

  /**
   * Decode to interleaved sRGB pixels with exactly `channels` channels
   */
  toRaw(input: Buffer, channels: RawChannels): Promise<RawImage>;

  /**
   * Encode a raw raster as PNG
   */
  encodePng(image: RawImage): Promise<Buffer>;

  /**
   * Crop-to-fill: scale to cover the box, centre-crop the overflow. PNG out, alpha preserved.
   */
  fitAndCenter(input: Buffer, box: Size): Promise<Buffer>;

  /**
   * Stretch-to-fill: scale each axis to the box. PNG out, alpha preserved.
   */
  fitToBox(input: Buffer, box: Size): Promise<Buffer>;

  /**
   * Rotate clockwise by a multiple of 90 degrees. PNG out.
   */
  rotate(input: Buffer, angle: 90 | 180 | 270): Promise<Buffer>;

  /**
   * Gaussian blur of a raw raster, same layout out
   */
  blur(image: RawImage, sigma: number): Promise<RawImage>;

  /**
   * Check if provider is available
   */
  isAvailable(): boolean;
}
