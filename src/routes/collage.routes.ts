import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { sessionsController } from '../controllers/sessions.controller.js';
import { backgroundTemplateService } from '../services/background-template.service.js';
import { getConfig } from '../config/index.js';
import { computeLayout } from '../utils/geometry.js';
import { rgbToHex } from '../utils/color.js';
import { BadRequestError } from '../utils/errors.js';
import { SUPPORTED_IMAGE_MIME_TYPES } from '../utils/image-utils.js';
import {
  createSessionSchema,
  processRequestSchema,
  sessionIdParamsSchema,
  ownerParamsSchema,
  uploadParamsSchema,
} from '../types/session.types.js';

const nullableString = { type: ['string', 'null'] };

const sessionResponseSchema = {
  type: 'object',
  properties: {
    id: { type: 'string' },
    ownerId: { type: 'string' },
    channelId: nullableString,
    threadRef: nullableString,
    status: { type: 'string' },
    image1Path: nullableString,
    image2Path: nullableString,
    outputPath: nullableString,
    backgroundName: nullableString,
    overlayColor: nullableString,
    errorMessage: nullableString,
    outputUrl: { type: 'string' },
    createdAt: { type: 'string', format: 'date-time' },
    updatedAt: { type: 'string', format: 'date-time' },
  },
};

const sessionIdParams = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'string', format: 'uuid' },
  },
};

/**
 * Collage routes
 */
export async function collageRoutes(fastify: FastifyInstance): Promise<void> {
  const config = getConfig();

  // Uploads arrive as the raw image body
  fastify.addContentTypeParser(
    [...SUPPORTED_IMAGE_MIME_TYPES],
    { parseAs: 'buffer', bodyLimit: config.server.maxUploadBytes },
    (_request, body, done) => {
      done(null, body);
    }
  );

  /**
   * Start a session (or return the active one)
   */
  fastify.post(
    '/sessions',
    {
      schema: {
        description: 'Start a collage session for an owner, or return their active session',
        tags: ['Sessions'],
        body: {
          type: 'object',
          required: ['ownerId'],
          properties: {
            ownerId: { type: 'string' },
            channelId: { type: 'string' },
            threadRef: { type: 'string' },
          },
        },
        response: {
          201: sessionResponseSchema,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const validated = createSessionSchema.parse(request.body);
      const session = await sessionsController.createSession(validated);
      return reply.status(201).send(session);
    }
  );

  /**
   * Active session for an owner
   */
  fastify.get(
    '/sessions/owner/:ownerId',
    {
      schema: {
        description: 'Get the newest non-terminal session of an owner',
        tags: ['Sessions'],
        params: {
          type: 'object',
          required: ['ownerId'],
          properties: {
            ownerId: { type: 'string' },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { ownerId } = ownerParamsSchema.parse(request.params);
      const session = await sessionsController.getActiveSession(ownerId);
      return reply.send({ session });
    }
  );

  /**
   * Get session by ID
   */
  fastify.get(
    '/sessions/:id',
    {
      schema: {
        description: 'Get session details, with a download URL once completed',
        tags: ['Sessions'],
        params: sessionIdParams,
        response: {
          200: sessionResponseSchema,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { id } = sessionIdParamsSchema.parse(request.params);
      const session = await sessionsController.getSessionView(id);
      return reply.send(session);
    }
  );

  /**
   * Upload image 1 (product) or image 2 (variants)
   */
  fastify.put(
    '/uploads/:ownerId/:imageNum',
    {
      schema: {
        description: 'Upload an image into the owner\'s active session. Body is the raw PNG, JPEG or WebP bytes.',
        tags: ['Uploads'],
        consumes: [...SUPPORTED_IMAGE_MIME_TYPES],
        params: {
          type: 'object',
          required: ['ownerId', 'imageNum'],
          properties: {
            ownerId: { type: 'string' },
            imageNum: { type: 'integer', enum: [1, 2] },
          },
        },
        response: {
          200: {
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              path: { type: 'string' },
              sessionId: { type: 'string' },
              status: { type: 'string' },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { ownerId, imageNum } = uploadParamsSchema.parse(request.params);
      const body = request.body;

      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw new BadRequestError('Request body must contain image data');
      }

      const contentType = request.headers['content-type'] ?? 'application/octet-stream';
      const { session, path } = await sessionsController.uploadImage(ownerId, imageNum, body, contentType);

      return reply.send({ success: true, path, sessionId: session.id, status: session.status });
    }
  );

  /**
   * Queue a session for rendering
   */
  fastify.post(
    '/process',
    {
      schema: {
        description: 'Queue a session with both images for rendering',
        tags: ['Sessions'],
        body: {
          type: 'object',
          required: ['sessionId'],
          properties: {
            sessionId: { type: 'string', format: 'uuid' },
            backgroundName: { type: 'string' },
          },
        },
        response: {
          202: sessionResponseSchema,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { sessionId, backgroundName } = processRequestSchema.parse(request.body);
      const session = await sessionsController.requestProcessing(sessionId, backgroundName);
      return reply.status(202).send(session);
    }
  );

  /**
   * Presigned download URL for the rendered collage
   */
  fastify.get(
    '/sessions/:id/output',
    {
      schema: {
        description: 'Get a presigned download URL for a completed collage',
        tags: ['Sessions'],
        params: sessionIdParams,
        response: {
          200: {
            type: 'object',
            properties: {
              url: { type: 'string' },
              expiresIn: { type: 'number' },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { id } = sessionIdParamsSchema.parse(request.params);
      const url = await sessionsController.getOutputUrl(id);
      return reply.send({ url, expiresIn: getConfig().storage.outputUrlExpirySeconds });
    }
  );

  /**
   * Cancel a session
   */
  fastify.delete(
    '/sessions/:id',
    {
      schema: {
        description: 'Delete a session and its stored images',
        tags: ['Sessions'],
        params: sessionIdParams,
        response: {
          200: {
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              message: { type: 'string' },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { id } = sessionIdParamsSchema.parse(request.params);
      await sessionsController.cancelSession(id);
      return reply.send({ success: true, message: `Session ${id} cancelled` });
    }
  );

  /**
   * Available templates and overlay colours
   */
  fastify.get(
    '/backgrounds',
    {
      schema: {
        description: 'List background templates and the overlay palette',
        tags: ['Collage'],
        response: {
          200: {
            type: 'object',
            properties: {
              backgrounds: { type: 'array', items: { type: 'string' } },
              overlayColors: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: {
                    name: { type: 'string' },
                    label: { type: 'string' },
                    hex: { type: 'string' },
                  },
                },
              },
            },
          },
        },
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { palette } = getConfig().collage;
      return reply.send({
        backgrounds: backgroundTemplateService.listNames(),
        overlayColors: palette.map((color) => ({ name: color.name, label: color.label, hex: rgbToHex(color.rgb) })),
      });
    }
  );

  /**
   * Canvas geometry
   */
  fastify.get(
    '/info',
    {
      schema: {
        description: 'Canvas size, border, gap and panel rectangles',
        tags: ['Collage'],
      },
    },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { canvas } = getConfig().collage;
      const layout = computeLayout(canvas);
      return reply.send({
        canvas: { width: canvas.width, height: canvas.height },
        border: canvas.border,
        gap: canvas.gap,
        widthRatios: canvas.widthRatios,
        productPanel: layout.productPanel,
        variantsPanel: layout.variantsPanel,
      });
    }
  );
}
