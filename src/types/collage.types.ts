/**
 * RGB triple, 0-255 per channel
 */
export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * Named overlay colour from the palette
 */
export interface OverlayColor {
  /** Machine name, e.g. "bottle_green" */
  name: string;
  /** Human readable label, e.g. "Bottle Green" */
  label: string;
  rgb: Rgb;
}

/**
 * Decoded raster in sharp's raw layout (interleaved channels, row-major)
 */
export interface RawImage {
  data: Uint8Array;
  width: number;
  height: number;
  channels: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Size {
  x: number;
  y: number;
}

/**
 * Canvas geometry. Ratios are [product panel, variants panel] and must sum to 1.
 */
export interface CanvasConfig {
  width: number;
  height: number;
  border: number;
  gap: number;
  widthRatios: readonly [number, number];
}

/**
 * Panel rectangles derived from a CanvasConfig
 */
export interface CollageLayout {
  canvas: Size;
  /** Left-hand panel: overlay + product cutout */
  productPanel: Rect;
  /** Strip between the panels; nothing is drawn into it */
  gap: Rect;
  /** Right-hand panel: colour variants */
  variantsPanel: Rect;
}

export interface SharpenSettings {
  /** Gaussian sigma in pixels */
  radius: number;
  /** Strength in percent (150 = add 1.5x the detail) */
  percent: number;
  /** Minimum absolute channel delta that gets sharpened */
  threshold: number;
}

export interface EnhancementSettings {
  sharpen: SharpenSettings;
  /** Contrast multiplier, 1 = unchanged */
  contrast: number;
  /** Saturation multiplier, 1 = unchanged */
  saturation: number;
}

export interface CollageConfig {
  canvas: CanvasConfig;
  /** Overlay palette: first entry for dark products, last for light ones */
  palette: readonly OverlayColor[];
  /** Pixels with alpha below this are ignored by the colour analysis */
  alphaThreshold: number;
  enhancement: EnhancementSettings;
  /** Rotate the variants image 90deg when its orientation disagrees with the panel */
  autoRotateVariants: boolean;
}

/**
 * Inputs to a single collage render
 */
export interface CollageInput {
  /** Product image after background removal (RGBA) */
  product: Buffer;
  /** Colour variants image */
  variants: Buffer;
  overlayColor: OverlayColor;
  backgroundTemplate: Buffer;
}

export interface CollageResult {
  /** PNG encoded canvas */
  buffer: Buffer;
  overlayColor: OverlayColor;
  layout: CollageLayout;
}
