import type { CanvasConfig, CollageLayout, Size } from '../types/collage.types.js';
import { ConfigurationError } from './errors.js';

const RATIO_TOLERANCE = 1e-6;

/**
 * Resize-then-crop plan. Applying it yields exactly the target box.
 */
export interface CropToFillPlan {
  resize: Size;
  crop: { left: number; top: number; width: number; height: number };
}

export interface StretchToFillPlan {
  resize: Size;
}

function assertBox(box: Size): void {
  if (!Number.isInteger(box.width) || !Number.isInteger(box.height) || box.width <= 0 || box.height <= 0) {
    throw new ConfigurationError(`Target box must have positive integer dimensions, got ${box.width}x${box.height}`);
  }
}

function assertSource(src: Size): void {
  if (src.width <= 0 || src.height <= 0) {
    throw new ConfigurationError(`Source must have positive dimensions, got ${src.width}x${src.height}`);
  }
}

/**
 * Scale uniformly so the box is covered, then centre-crop the overflow.
 * Aspect ratio is preserved; nothing is letterboxed.
 */
export function planCropToFill(src: Size, box: Size): CropToFillPlan {
  assertSource(src);
  assertBox(box);

  const scale = Math.max(box.width / src.width, box.height / src.height);
  // Rounding can land one pixel short of the box on the fitted axis
  const width = Math.max(box.width, Math.round(src.width * scale));
  const height = Math.max(box.height, Math.round(src.height * scale));

  return {
    resize: { width, height },
    crop: {
      left: Math.floor((width - box.width) / 2),
      top: Math.floor((height - box.height) / 2),
      width: box.width,
      height: box.height,
    },
  };
}

/**
 * Scale each axis independently to the box
 */
export function planStretchToFill(src: Size, box: Size): StretchToFillPlan {
  assertSource(src);
  assertBox(box);
  return { resize: { width: box.width, height: box.height } };
}

/**
 * Check canvas geometry. Throws ConfigurationError describing the first problem found.
 */
export function validateCanvasConfig(canvas: CanvasConfig): void {
  const { width, height, border, gap, widthRatios } = canvas;
  const [productRatio, variantsRatio] = widthRatios;

  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new ConfigurationError(`Canvas must have positive integer dimensions, got ${width}x${height}`);
  }
  if (!Number.isInteger(border) || border < 0) {
    throw new ConfigurationError(`Border must be a non-negative integer, got ${border}`);
  }
  if (!Number.isInteger(gap) || gap < 0) {
    throw new ConfigurationError(`Gap must be a non-negative integer, got ${gap}`);
  }
  for (const ratio of widthRatios) {
    if (!(ratio > 0 && ratio < 1)) {
      throw new ConfigurationError(`Width ratios must be in (0, 1), got ${ratio}`);
    }
  }
  if (Math.abs(productRatio + variantsRatio - 1) > RATIO_TOLERANCE) {
    throw new ConfigurationError(`Width ratios must sum to 1, got ${productRatio + variantsRatio}`);
  }

  const usable = width - 2 * border - gap;
  const panelHeight = height - 2 * border;
  const productWidth = Math.floor(usable * productRatio);
  if (panelHeight <= 0 || productWidth <= 0 || usable - productWidth <= 0) {
    throw new ConfigurationError(
      `Border ${border} and gap ${gap} leave no room for panels on a ${width}x${height} canvas`
    );
  }
}

/**
 * Derive panel rectangles from canvas geometry
 */
export function computeLayout(canvas: CanvasConfig): CollageLayout {
  validateCanvasConfig(canvas);

  const { width, height, border, gap, widthRatios } = canvas;
  const usable = width - 2 * border - gap;
  const panelHeight = height - 2 * border;
  const productWidth = Math.floor(usable * widthRatios[0]);
  const variantsWidth = usable - productWidth;

  return {
    canvas: { width, height },
    productPanel: { x: border, y: border, width: productWidth, height: panelHeight },
    gap: { x: border + productWidth, y: border, width: gap, height: panelHeight },
    variantsPanel: {
      x: border + productWidth + gap,
      y: border,
      width: variantsWidth,
      height: panelHeight,
    },
  };
}

/**
 * Whether an image of this size should be turned 90 degrees to match the
 * orientation of the box it will be stretched into. Square inputs or boxes never rotate.
 */
export function needsOrientationSwap(src: Size, box: Size): boolean {
  const srcLandscape = src.width > src.height;
  const srcPortrait = src.height > src.width;
  const boxLandscape = box.width > box.height;
  const boxPortrait = box.height > box.width;
  return (srcLandscape && boxPortrait) || (srcPortrait && boxLandscape);
}
