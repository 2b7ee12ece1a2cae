import type { FastifyInstance } from 'fastify';
import { pingDatabase } from '../db/index.js';
import { pingRedis } from '../queues/connection.js';
import { backgroundTemplateService } from '../services/background-template.service.js';

type CheckStatus = 'ok' | 'error';

interface HealthResponse {
  status: CheckStatus;
  timestamp: string;
}

interface ReadinessChecks {
  database: CheckStatus;
  redis: CheckStatus;
  templates: CheckStatus;
}

interface ReadinessResponse extends HealthResponse {
  checks: ReadinessChecks;
  missingTemplates?: string[];
}

const readinessSchema = {
  type: 'object',
  properties: {
    status: { type: 'string' },
    timestamp: { type: 'string' },
    checks: {
      type: 'object',
      properties: {
        database: { type: 'string' },
        redis: { type: 'string' },
        templates: { type: 'string' },
      },
    },
    missingTemplates: { type: 'array', items: { type: 'string' } },
  },
};

function toStatus(ok: boolean): CheckStatus {
  return ok ? 'ok' : 'error';
}

/**
 * Health check routes
 */
export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  /**
   * Liveness probe - is the service running?
   */
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    {
      schema: {
        description: 'Liveness probe',
        tags: ['Health'],
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              timestamp: { type: 'string' },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        status: 'ok',
        timestamp: new Date().toISOString(),
      });
    }
  );

  /**
   * Readiness probe - database, Redis and template files
   */
  fastify.get<{ Reply: ReadinessResponse }>(
    '/ready',
    {
      schema: {
        description: 'Readiness probe - checks database, Redis and background template files',
        tags: ['Health'],
        response: {
          200: readinessSchema,
          503: readinessSchema,
        },
      },
    },
    async (_request, reply) => {
      const [databaseUp, redisUp, missing] = await Promise.all([
        pingDatabase(),
        pingRedis(),
        backgroundTemplateService.missingTemplates(),
      ]);

      const checks: ReadinessChecks = {
        database: toStatus(databaseUp),
        redis: toStatus(redisUp),
        templates: missing.length === 0 ? 'ok' : 'error',
      };
      const allOk = Object.values(checks).every((check) => check === 'ok');

      const body: ReadinessResponse = {
        status: allOk ? 'ok' : 'error',
        timestamp: new Date().toISOString(),
        checks,
      };
      if (missing.length > 0) {
        body.missingTemplates = missing;
      }

      return reply.status(allOk ? 200 : 503).send(body);
    }
  );
}
