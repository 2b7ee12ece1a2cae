import sharp from 'sharp';
import type { ImageTransformProvider, RawChannels } from '../interfaces/image-transform.provider.js';
import type { RawImage, Size } from '../../types/collage.types.js';
import { planCropToFill, planStretchToFill } from '../../utils/geometry.js';
import { InvalidImageError } from '../../utils/errors.js';

const KERNEL = 'lanczos3';
const SHARP_CHANNELS: readonly sharp.Channels[] = [1, 2, 3, 4];

function toSharpChannels(channels: number): sharp.Channels {
  const match = SHARP_CHANNELS.find((c) => c === channels);
  if (match === undefined) {
    throw new InvalidImageError(`Unsupported channel count: ${channels}`);
  }
  return match;
}

function fromRaw(image: RawImage): sharp.Sharp {
  return sharp(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength), {
    raw: { width: image.width, height: image.height, channels: toSharpChannels(image.channels) },
  });
}

async function decodeFailure<T>(work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (error) {
    if (error instanceof InvalidImageError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidImageError(`Could not decode image: ${message}`);
  }
}

/**
 * Sharp Image Transform Provider
 *
 * Uses Sharp (libvips) for high-performance image manipulation.
 */
export class SharpImageTransformProvider implements ImageTransformProvider {
  readonly providerId = 'sharp';

  async getDimensions(input: Buffer): Promise<Size> {
    const metadata = await decodeFailure(sharp(input).metadata());
    const width = metadata.width ?? 0;
    const height = metadata.height ?? 0;
    if (width <= 0 || height <= 0) {
      throw new InvalidImageError('Image has zero dimensions');
    }
    return { width, height };
  }

  async toRaw(input: Buffer, channels: RawChannels): Promise<RawImage> {
    let pipeline = sharp(input).toColourspace('srgb');
    pipeline = channels === 4 ? pipeline.ensureAlpha() : pipeline.removeAlpha();

    const { data, info } = await decodeFailure(pipeline.raw().toBuffer({ resolveWithObject: true }));
    return { data, width: info.width, height: info.height, channels: info.channels };
  }

  async encodePng(image: RawImage): Promise<Buffer> {
    return fromRaw(image).png().toBuffer();
  }

  async fitAndCenter(input: Buffer, box: Size): Promise<Buffer> {
    const source = await this.getDimensions(input);
    const { resize, crop } = planCropToFill(source, box);

    return decodeFailure(
      sharp(input)
        .resize(resize.width, resize.height, { fit: 'fill', kernel: KERNEL })
        .extract(crop)
        .png()
        .toBuffer()
    );
  }

  async fitToBox(input: Buffer, box: Size): Promise<Buffer> {
    const source = await this.getDimensions(input);
    const { resize } = planStretchToFill(source, box);

    return decodeFailure(
      sharp(input)
        .resize(resize.width, resize.height, { fit: 'fill', kernel: KERNEL })
        .png()
        .toBuffer()
    );
  }

  async rotate(input: Buffer, angle: 90 | 180 | 270): Promise<Buffer> {
    return decodeFailure(sharp(input).rotate(angle).png().toBuffer());
  }

  async blur(image: RawImage, sigma: number): Promise<RawImage> {
    const { data, info } = await fromRaw(image).blur(sigma).raw().toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height, channels: info.channels };
  }

  isAvailable(): boolean {
    // Sharp is bundled, always available
    return true;
  }
}

export const sharpImageTransformProvider = new SharpImageTransformProvider();
