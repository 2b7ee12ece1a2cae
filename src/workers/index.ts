import 'dotenv/config';
import http from 'node:http';

import { parseEnv } from '../config/env.js';
import { getConfig } from '../config/index.js';
import { getLogger } from '../utils/logger.js';
import { validateCanvasConfig } from '../utils/geometry.js';
import { initDatabase, closeDatabase } from '../db/index.js';
import { openRedisConnection, closeRedisConnection } from '../queues/connection.js';
import { startCollageWorker, stopCollageWorker } from './collage.worker.js';
import { backgroundTemplateService } from '../services/background-template.service.js';
import { providerRegistry, setupDefaultProviders } from '../providers/index.js';

// Simple health check server for container orchestration
let healthServer: http.Server | null = null;

/**
 * Start a simple HTTP server for health checks
 */
function startHealthServer(port: number): void {
  healthServer = http.createServer((req, res) => {
    if (req.url === '/health' && req.method === 'GET') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok', service: 'collage-worker' }));
    } else {
      res.writeHead(404);
      res.end();
    }
  });

  healthServer.listen(port, () => {
    getLogger().info({ port }, 'Worker health server started');
  });
}

async function stopHealthServer(): Promise<void> {
  return new Promise((resolve) => {
    if (healthServer) {
      healthServer.close(() => resolve());
    } else {
      resolve();
    }
  });
}

/**
 * Worker entry point
 */
async function main(): Promise<void> {
  // Validate environment first
  parseEnv();

  const config = getConfig();
  const logger = getLogger();

  validateCanvasConfig(config.collage.canvas);

  logger.info({ env: config.server.env }, 'Starting collage worker');

  setupDefaultProviders();

  const { provider: remover, providerId } = providerRegistry.get('backgroundRemoval');
  if (!remover.isAvailable()) {
    logger.error(
      { providerId, available: providerRegistry.getAvailable('backgroundRemoval').map((p) => p.providerId) },
      'Default background removal provider has no credentials - set REPLICATE_API_TOKEN or STABILITY_API_KEY'
    );
    process.exit(1);
  }

  const missing = await backgroundTemplateService.missingTemplates();
  if (missing.length > 0) {
    logger.error(
      { missing, backgroundsDir: config.assets.backgroundsDir },
      'Background templates missing - run npm run generate:backgrounds'
    );
    process.exit(1);
  }

  // Initialize connections
  await initDatabase();
  openRedisConnection('worker');

  startCollageWorker();

  startHealthServer(config.server.port);

  logger.info(
    { concurrency: config.worker.concurrency, providerId },
    'Worker started successfully'
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await stopHealthServer();
      await stopCollageWorker();
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
  // Use stderr for fatal errors before/after logger availability
  process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
  if (error instanceof Error && error.stack) {
    process.stderr.write(`${error.stack}\n`);
  }
  process.exit(1);
});
