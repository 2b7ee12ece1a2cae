import type { RawImage, SharpenSettings } from '../types/collage.types.js';
import { InvalidImageError } from './errors.js';

/** Smallest blur sigma that still changes anything visible */
export const MIN_SHARPEN_RADIUS = 0.3;

function clampByte(value: number): number {
  return value < 0 ? 0 : value > 255 ? 255 : value;
}

function assertColour(image: RawImage): void {
  if (image.channels !== 3 && image.channels !== 4) {
    throw new InvalidImageError(`Expected RGB or RGBA raster, got ${image.channels} channels`);
  }
}

/**
 * ITU-R 601 luma
 */
export function luma(r: number, g: number, b: number): number {
  return 0.299 * r + 0.587 * g + 0.114 * b;
}

export function shouldSharpen(settings: SharpenSettings): boolean {
  return settings.percent > 0 && settings.radius >= MIN_SHARPEN_RADIUS;
}

/**
 * Unsharp-mask combine step. `blurred` is the Gaussian-blurred copy of `original`
 * with identical layout. Channels whose difference is under the threshold are left alone.
 * Alpha is copied through.
 */
export function applyUnsharpMask(
  original: RawImage,
  blurred: RawImage,
  settings: Pick<SharpenSettings, 'percent' | 'threshold'>
): RawImage {
  assertColour(original);
  if (
    blurred.width !== original.width ||
    blurred.height !== original.height ||
    blurred.channels !== original.channels
  ) {
    throw new InvalidImageError('Blurred raster does not match the original');
  }

  const { data, channels } = original;
  const out = new Uint8Array(data.length);
  const amount = settings.percent / 100;

  for (let i = 0; i < data.length; i++) {
    const value = data[i];
    if (channels === 4 && i % 4 === 3) {
      out[i] = value;
      continue;
    }
    const diff = value - blurred.data[i];
    out[i] = Math.abs(diff) >= settings.threshold ? clampByte(Math.round(value + diff * amount)) : value;
  }

  return { ...original, data: out };
}

/**
 * Scale each channel's distance from the image's mean luma
 */
export function adjustContrast(image: RawImage, factor: number): RawImage {
  assertColour(image);
  const { data, channels } = image;
  const pixels = image.width * image.height;
  if (pixels === 0) {
    return { ...image, data: new Uint8Array(data) };
  }

  let total = 0;
  for (let i = 0; i < pixels * channels; i += channels) {
    total += luma(data[i], data[i + 1], data[i + 2]);
  }
  const mean = Math.round(total / pixels);

  const out = new Uint8Array(data.length);
  for (let i = 0; i < data.length; i++) {
    if (channels === 4 && i % 4 === 3) {
      out[i] = data[i];
      continue;
    }
    out[i] = clampByte(Math.round(mean + (data[i] - mean) * factor));
  }

  return { ...image, data: out };
}

/**
 * Scale each channel's distance from the pixel's own grey level (luma rounded to a byte)
 */
export function adjustSaturation(image: RawImage, factor: number): RawImage {
  assertColour(image);
  const { data, channels } = image;
  const out = new Uint8Array(data.length);

  for (let i = 0; i + channels <= data.length; i += channels) {
    const r = data[i];
    const g = data[i + 1];
    const b = data[i + 2];
    const grey = Math.round(luma(r, g, b));
    out[i] = clampByte(Math.round(grey + (r - grey) * factor));
    out[i + 1] = clampByte(Math.round(grey + (g - grey) * factor));
    out[i + 2] = clampByte(Math.round(grey + (b - grey) * factor));
    if (channels === 4) {
      out[i + 3] = data[i + 3];
    }
  }

  return { ...image, data: out };
}
