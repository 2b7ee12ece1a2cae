/**
 * Collage defaults
 */

import type { CollageConfig, EnhancementSettings, OverlayColor } from '../types/collage.types.js';

/**
 * Solid overlays for the product panel. The first entry goes behind dark
 * products and the last behind light ones; the middle entries are never picked.
 */
export const OVERLAY_PALETTE: readonly OverlayColor[] = [
  { name: 'sky_blue', label: 'Sky Blue', rgb: { r: 135, g: 206, b: 235 } },
  { name: 'cream', label: 'Cream', rgb: { r: 255, g: 248, b: 220 } },
  { name: 'tan', label: 'Tan', rgb: { r: 210, g: 180, b: 140 } },
  { name: 'olive', label: 'Olive', rgb: { r: 128, g: 128, b: 0 } },
  { name: 'bottle_green', label: 'Bottle Green', rgb: { r: 0, g: 106, b: 78 } },
];

/**
 * Pastel base colours for the generated background templates
 */
export const BACKGROUND_COLORS: readonly { name: string; hex: string }[] = [
  { name: 'light_pink', hex: '#FFB6C1' },
  { name: 'mint_green', hex: '#98FF98' },
  { name: 'powder_blue', hex: '#B0E0E6' },
  { name: 'lavender', hex: '#E6E6FA' },
  { name: 'cream', hex: '#FFFDD0' },
];

/**
 * Alpha below which a pixel counts as background (matches common colour-thief practice)
 */
export const DEFAULT_ALPHA_THRESHOLD = 125;

export const DEFAULT_ENHANCEMENT: EnhancementSettings = {
  sharpen: { radius: 2, percent: 150, threshold: 3 },
  contrast: 1.08,
  saturation: 1.12,
};

export const DEFAULT_COLLAGE_CONFIG: CollageConfig = {
  canvas: {
    width: 1920,
    height: 1080,
    border: 25,
    gap: 10,
    widthRatios: [0.25, 0.75],
  },
  palette: OVERLAY_PALETTE,
  alphaThreshold: DEFAULT_ALPHA_THRESHOLD,
  enhancement: DEFAULT_ENHANCEMENT,
  autoRotateVariants: false,
};
