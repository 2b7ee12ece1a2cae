import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { PipelineTimer } from '../utils/timer.js';
import { selectOverlayColor } from '../utils/color.js';
import { getImageMimeType } from '../utils/image-utils.js';
import { BadRequestError, ConfigurationError, ConflictError, EmptyForegroundError } from '../utils/errors.js';
import { providerRegistry } from '../providers/provider-registry.js';
import { CompositorService } from './compositor.service.js';
import { storageService } from './storage.service.js';
import { backgroundTemplateService } from './background-template.service.js';
import { sessionsController } from '../controllers/sessions.controller.js';
import type { CollageSession } from '../db/schema.js';
import type { CollageConfig, OverlayColor } from '../types/collage.types.js';

const logger = createChildLogger({ service: 'collage-pipeline' });

export interface CollageRunResult {
  session: CollageSession;
  outputPath: string;
  overlayColor: OverlayColor;
  backgroundName: string;
}

/**
 * CollagePipelineService - renders one session end to end
 *
 * download inputs -> remove product background -> pick overlay ->
 * load template -> compose -> upload -> mark completed.
 * Any failure marks the session failed and is rethrown for the queue.
 */
export class CollagePipelineService {
  async run(session: CollageSession): Promise<CollageRunResult> {
    const sessionId = session.id;
    const config = getConfig().collage;
    const timer = new PipelineTimer(sessionId);

    logger.info({ sessionId, backgroundName: session.backgroundName }, 'Starting collage render');

    try {
      const { image1Path, image2Path } = session;
      if (!image1Path || !image2Path) {
        throw new BadRequestError('Session is missing uploaded images');
      }

      const [productImage, variantsImage] = await timer.time('download', () =>
        Promise.all([storageService.downloadBuffer(image1Path), storageService.downloadBuffer(image2Path)])
      );

      const { provider: remover, providerId } = providerRegistry.get('backgroundRemoval');
      logger.debug({ sessionId, providerId }, 'Removing product background');
      const cutout = await timer.time('remove-background', () =>
        remover.removeBackground(productImage, { requestId: sessionId, mimeType: getImageMimeType(image1Path) })
      );

      const { provider: transform } = providerRegistry.get('imageTransform');
      const compositor = new CompositorService(transform);

      const overlayColor = await timer.time('analyze-colour', () =>
        this.chooseOverlay(compositor, cutout, config, sessionId)
      );

      const template = await timer.time('load-template', () =>
        backgroundTemplateService.resolve(session.backgroundName ?? undefined)
      );

      const collage = await timer.time('compose', () =>
        compositor.createCollage(
          { product: cutout, variants: variantsImage, overlayColor, backgroundTemplate: template.buffer },
          config
        )
      );

      const outputPath = storageService.getOutputKey(sessionId);
      await timer.time('upload', () => storageService.uploadBuffer(collage.buffer, outputPath, 'image/png'));

      const completed = await this.complete(sessionId, outputPath, overlayColor.name);

      timer.logSummary();
      logger.info(
        { sessionId, outputPath, overlay: overlayColor.name, backgroundName: template.name },
        'Collage render completed'
      );

      return { session: completed, outputPath, overlayColor, backgroundName: template.name };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ sessionId, error: message }, 'Collage render failed');
      timer.logSummary();

      await sessionsController.markFailed(sessionId, message);
      throw error;
    }
  }

  /**
   * Record the output. A session cancelled mid-render loses its row, so the upload is removed again.
   */
  private async complete(sessionId: string, outputPath: string, overlayName: string): Promise<CollageSession> {
    try {
      return await sessionsController.markCompleted(sessionId, outputPath, overlayName);
    } catch (error) {
      if (error instanceof ConflictError) {
        try {
          await storageService.deleteFile(outputPath);
          logger.info({ sessionId, outputPath }, 'Session gone before completion, output removed');
        } catch (cleanupError) {
          logger.warn({ sessionId, outputPath, error: cleanupError }, 'Failed to remove output, may be orphaned');
        }
      }
      throw error;
    }
  }

  /**
   * Contrast overlay for the cutout. A cutout with nothing opaque gets the first palette colour.
   */
  private async chooseOverlay(
    compositor: CompositorService,
    cutout: Buffer,
    config: CollageConfig,
    sessionId: string
  ): Promise<OverlayColor> {
    try {
      const dominant = await compositor.analyzeForeground(cutout, config.alphaThreshold);
      const overlay = selectOverlayColor(dominant, config.palette);
      logger.debug({ sessionId, dominant, overlay: overlay.name }, 'Overlay colour selected');
      return overlay;
    } catch (error) {
      if (!(error instanceof EmptyForegroundError)) {
        throw error;
      }

      const fallback = config.palette[0];
      if (!fallback) {
        throw new ConfigurationError('Overlay palette is empty');
      }
      logger.warn({ sessionId, overlay: fallback.name }, 'Cutout has no opaque pixels, using first palette overlay');
      return fallback;
    }
  }
}

export const collagePipelineService = new CollagePipelineService();
