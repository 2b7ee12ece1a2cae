/**
 * Generate the pastel background templates into BACKGROUNDS_DIR
 * Run with: npm run generate:backgrounds [-- --force]
 */

// Load environment variables first
import 'dotenv/config';

import { mkdir, writeFile, access } from 'fs/promises';
import path from 'path';

import { getConfig } from '../src/config/index.js';
import { getLogger } from '../src/utils/logger.js';
import { BACKGROUND_COLORS } from '../src/utils/constants.js';
import { renderPatternBackground } from '../src/services/background-template.service.js';

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function main(): Promise<void> {
  const config = getConfig();
  const logger = getLogger();
  const force = process.argv.includes('--force');

  const outputDir = path.resolve(config.assets.backgroundsDir);
  const size = { width: config.collage.canvas.width, height: config.collage.canvas.height };
  await mkdir(outputDir, { recursive: true });

  for (const { name, hex } of BACKGROUND_COLORS) {
    const fileName = `base_${name}.png`;
    const filePath = path.join(outputDir, fileName);

    if (!force && (await exists(filePath))) {
      logger.info({ fileName }, 'Background exists, skipping (use --force to overwrite)');
      continue;
    }

    // Seeded by name so reruns reproduce the same file
    const png = await renderPatternBackground(hex, name, size);
    await writeFile(filePath, png);
    logger.info({ fileName, ...size, bytes: png.length }, 'Background written');
  }

  const unknown = config.assets.backgroundNames.filter(
    (configured) => !BACKGROUND_COLORS.some(({ name }) => `base_${name}.png` === configured)
  );
  if (unknown.length > 0) {
    logger.warn({ unknown }, 'BACKGROUND_NAMES lists templates this script does not generate');
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
