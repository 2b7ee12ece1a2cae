import sharp from 'sharp';
import { createChildLogger } from '../utils/logger.js';
import { computeLayout, needsOrientationSwap } from '../utils/geometry.js';
import { dominantColorFromRgba } from '../utils/color.js';
import { adjustContrast, adjustSaturation, applyUnsharpMask, shouldSharpen } from '../utils/enhance.js';
import { sharpImageTransformProvider } from '../providers/implementations/sharp-image-transform.provider.js';
import type { ImageTransformProvider } from '../providers/interfaces/image-transform.provider.js';
import type {
  CollageConfig,
  CollageInput,
  CollageResult,
  EnhancementSettings,
  RawImage,
  Rect,
  Rgb,
} from '../types/collage.types.js';

const logger = createChildLogger({ service: 'compositor' });

/**
 * CompositorService - layered collage rendering
 *
 * Draw order: template (whole canvas), variants (right panel), overlay and
 * product cutout (left panel). Border and gap are left showing the template.
 * A single enhancement pass runs over the flattened canvas.
 */
export class CompositorService {
  constructor(private readonly transform: ImageTransformProvider = sharpImageTransformProvider) {}

  /**
   * Dominant foreground colour of a background-removed image
   */
  async analyzeForeground(image: Buffer, alphaThreshold: number): Promise<Rgb> {
    const raster = await this.transform.toRaw(image, 4);
    return dominantColorFromRgba(raster, alphaThreshold);
  }

  async createCollage(input: CollageInput, config: CollageConfig): Promise<CollageResult> {
    const layout = computeLayout(config.canvas);
    const { productPanel, variantsPanel } = layout;

    const base = await this.transform.fitAndCenter(input.backgroundTemplate, layout.canvas);
    const variants = await this.prepareVariants(input.variants, variantsPanel, config.autoRotateVariants);
    const overlay = await this.solidPanel(productPanel, input.overlayColor.rgb);
    const product = await this.transform.fitAndCenter(input.product, productPanel);

    const layered = await sharp(base)
      .removeAlpha()
      .composite([
        { input: variants, left: variantsPanel.x, top: variantsPanel.y },
        { input: overlay, left: productPanel.x, top: productPanel.y },
        { input: product, left: productPanel.x, top: productPanel.y, blend: 'over' },
      ])
      .png()
      .toBuffer();

    const flat = await this.transform.toRaw(layered, 3);
    const enhanced = await this.enhance(flat, config.enhancement);
    const buffer = await this.transform.encodePng(enhanced);

    logger.debug(
      { width: layout.canvas.width, height: layout.canvas.height, overlay: input.overlayColor.name },
      'Collage rendered'
    );

    return { buffer, overlayColor: input.overlayColor, layout };
  }

  /**
   * Unsharp mask, then contrast, then saturation
   */
  async enhance(image: RawImage, settings: EnhancementSettings): Promise<RawImage> {
    let result = image;

    if (shouldSharpen(settings.sharpen)) {
      const blurred = await this.transform.blur(result, settings.sharpen.radius);
      result = applyUnsharpMask(result, blurred, settings.sharpen);
    }
    if (settings.contrast !== 1) {
      result = adjustContrast(result, settings.contrast);
    }
    if (settings.saturation !== 1) {
      result = adjustSaturation(result, settings.saturation);
    }

    return result;
  }

  private async prepareVariants(image: Buffer, panel: Rect, autoRotate: boolean): Promise<Buffer> {
    let source = image;

    if (autoRotate) {
      const size = await this.transform.getDimensions(image);
      if (needsOrientationSwap(size, panel)) {
        logger.debug({ source: size, panel }, 'Rotating variants image to match panel orientation');
        source = await this.transform.rotate(image, 90);
      }
    }

    return this.transform.fitToBox(source, panel);
  }

  private solidPanel(panel: Rect, rgb: Rgb): Promise<Buffer> {
    return sharp({
      create: { width: panel.width, height: panel.height, channels: 3, background: rgb },
    })
      .png()
      .toBuffer();
  }
}
