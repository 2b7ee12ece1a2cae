import type { OverlayColor, RawImage, Rgb } from '../types/collage.types.js';
import { DEFAULT_ALPHA_THRESHOLD } from './constants.js';
import { ConfigurationError, EmptyForegroundError, InvalidImageError } from './errors.js';

/** Bits kept per channel when bucketing pixels */
const QUANT_BITS = 5;
const QUANT_SHIFT = 8 - QUANT_BITS;
const BUCKET_COUNT = 1 << (QUANT_BITS * 3);

function bucketIndex(r: number, g: number, b: number): number {
  return (
    ((r >> QUANT_SHIFT) << (QUANT_BITS * 2)) |
    ((g >> QUANT_SHIFT) << QUANT_BITS) |
    (b >> QUANT_SHIFT)
  );
}

/**
 * Dominant colour of an RGBA raster, ignoring pixels whose alpha is below the threshold.
 *
 * Opaque pixels are bucketed into a 32x32x32 histogram. The fullest bucket wins
 * (lowest index on ties) and the result is the mean colour of its pixels.
 *
 * @throws InvalidImageError when the raster is not 4-channel or its buffer is short
 * @throws EmptyForegroundError when no pixel passes the alpha threshold
 */
export function dominantColorFromRgba(
  raster: RawImage,
  alphaThreshold = DEFAULT_ALPHA_THRESHOLD
): Rgb {
  const { data, width, height, channels } = raster;

  if (channels !== 4) {
    throw new InvalidImageError(`Expected RGBA raster, got ${channels} channels`);
  }
  if (data.length < width * height * 4) {
    throw new InvalidImageError('Raster buffer shorter than its dimensions');
  }

  const counts = new Uint32Array(BUCKET_COUNT);
  const sumR = new Float64Array(BUCKET_COUNT);
  const sumG = new Float64Array(BUCKET_COUNT);
  const sumB = new Float64Array(BUCKET_COUNT);
  let opaque = 0;

  const end = width * height * 4;
  for (let i = 0; i < end; i += 4) {
    if (data[i + 3] < alphaThreshold) continue;
    const r = data[i];
    const g = data[i + 1];
    const b = data[i + 2];
    const idx = bucketIndex(r, g, b);
    counts[idx]++;
    sumR[idx] += r;
    sumG[idx] += g;
    sumB[idx] += b;
    opaque++;
  }

  if (opaque === 0) {
    throw new EmptyForegroundError();
  }

  let best = 0;
  for (let idx = 1; idx < BUCKET_COUNT; idx++) {
    if (counts[idx] > counts[best]) {
      best = idx;
    }
  }

  const n = counts[best];
  return {
    r: Math.round(sumR[best] / n),
    g: Math.round(sumG[best] / n),
    b: Math.round(sumB[best] / n),
  };
}

/**
 * HLS lightness in [0, 1]
 */
export function lightness({ r, g, b }: Rgb): number {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  return (max + min) / 2 / 255;
}

/**
 * Pick the overlay that contrasts with the foreground: last palette entry for
 * light foregrounds (L > 0.5), first otherwise.
 */
export function selectOverlayColor(rgb: Rgb, palette: readonly OverlayColor[]): OverlayColor {
  const light = palette[0];
  const dark = palette[palette.length - 1];
  if (!light || !dark) {
    throw new ConfigurationError('Overlay palette is empty');
  }
  return lightness(rgb) > 0.5 ? dark : light;
}

export function rgbToHex({ r, g, b }: Rgb): string {
  return '#' + [r, g, b].map((c) => c.toString(16).padStart(2, '0')).join('').toUpperCase();
}

/**
 * Parse #RRGGBB (or RRGGBB)
 */
export function hexToRgb(hex: string): Rgb {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!match) {
    throw new ConfigurationError(`Invalid hex colour: ${hex}`);
  }
  return {
    r: parseInt(match[1], 16),
    g: parseInt(match[2], 16),
    b: parseInt(match[3], 16),
  };
}
