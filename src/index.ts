import 'dotenv/config';

import { parseEnv } from './config/env.js';
import { getConfig } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { validateCanvasConfig } from './utils/geometry.js';
import { initDatabase, closeDatabase } from './db/index.js';
import { openRedisConnection, closeRedisConnection } from './queues/connection.js';
import { initCollageQueue, closeCollageQueue } from './queues/collage.queue.js';
import { backgroundTemplateService } from './services/background-template.service.js';
import { buildApp } from './app.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  // Validate environment first
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  // Bad geometry should stop the process, not the first render
  validateCanvasConfig(config.collage.canvas);

  logger.info({ env: config.server.env }, 'Starting collage service');

  const missing = await backgroundTemplateService.missingTemplates();
  if (missing.length > 0) {
    logger.warn(
      { missing, backgroundsDir: config.assets.backgroundsDir },
      'Background templates missing, run npm run generate:backgrounds'
    );
  }

  // Initialize connections
  await initDatabase();
  openRedisConnection('api');
  initCollageQueue();

  // Build and start server
  const app = await buildApp();

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ port: config.server.port, host: config.server.host }, 'Server started successfully');
    logger.info(`Documentation available at http://localhost:${config.server.port}/docs`);
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await closeCollageQueue();
      await closeRedisConnection();
      await closeDatabase();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
  if (error instanceof Error && error.stack) {
    process.stderr.write(`${error.stack}\n`);
  }
  process.exit(1);
});
