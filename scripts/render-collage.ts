/**
 * Render a collage from two local files, without the database or queue
 * Run with: npx tsx scripts/render-collage.ts <product> <variants> [--background base_cream.png] [--out out.png] [--no-removal]
 */

// Load environment variables first
import 'dotenv/config';

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { parseArgs } from 'util';

import { getConfig } from '../src/config/index.js';
import { getLogger } from '../src/utils/logger.js';
import { PipelineTimer } from '../src/utils/timer.js';
import { selectOverlayColor, rgbToHex } from '../src/utils/color.js';
import { EmptyForegroundError } from '../src/utils/errors.js';
import { providerRegistry, setupDefaultProviders } from '../src/providers/index.js';
import { CompositorService } from '../src/services/compositor.service.js';
import { backgroundTemplateService } from '../src/services/background-template.service.js';
import type { OverlayColor } from '../src/types/collage.types.js';

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      background: { type: 'string' },
      out: { type: 'string' },
      'no-removal': { type: 'boolean' },
    },
  });

  const [productPath, variantsPath] = positionals;
  if (!productPath || !variantsPath) {
    process.stderr.write('Usage: render-collage.ts <product> <variants> [--background name] [--out file]\n');
    process.exit(1);
  }

  const outPath = values.out ?? 'collage.png';
  const config = getConfig().collage;
  const logger = getLogger();
  const timer = new PipelineTimer(path.basename(productPath), '[RENDER]');

  setupDefaultProviders();
  const compositor = new CompositorService(providerRegistry.get('imageTransform').provider);

  const [product, variants] = await Promise.all([readFile(productPath), readFile(variantsPath)]);

  let cutout: Buffer = product;
  if (!values['no-removal']) {
    const { provider, providerId } = providerRegistry.get('backgroundRemoval');
    logger.info({ providerId }, 'Removing background');
    cutout = await timer.time('remove-background', () => provider.removeBackground(product));
  }

  let overlay: OverlayColor;
  try {
    const dominant = await timer.time('analyze-colour', () =>
      compositor.analyzeForeground(cutout, config.alphaThreshold)
    );
    overlay = selectOverlayColor(dominant, config.palette);
    logger.info({ dominant: rgbToHex(dominant), overlay: overlay.name }, 'Overlay selected');
  } catch (error) {
    const fallback = config.palette[0];
    if (!(error instanceof EmptyForegroundError) || !fallback) {
      throw error;
    }
    overlay = fallback;
    logger.warn({ overlay: overlay.name }, 'Cutout has no opaque pixels, using first palette overlay');
  }

  const template = await timer.time('load-template', () => backgroundTemplateService.resolve(values.background));

  const result = await timer.time('compose', () =>
    compositor.createCollage(
      { product: cutout, variants, overlayColor: overlay, backgroundTemplate: template.buffer },
      config
    )
  );

  await writeFile(outPath, result.buffer);
  timer.logSummary();
  logger.info(
    { out: path.resolve(outPath), background: template.name, overlay: overlay.name, layout: result.layout },
    'Collage written'
  );
}

main().catch((error: unknown) => {
  process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
