import { describe, it, expect, vi, beforeAll, beforeEach } from 'vitest';
import sharp from 'sharp';

// Mock config
vi.mock('../config/index.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../config/index.js')>();
  return { ...actual, getConfig: vi.fn() };
});

// Mock logger
vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

// Mock storage
vi.mock('./storage.service.js', () => ({
  storageService: {
    downloadBuffer: vi.fn(),
    uploadBuffer: vi.fn().mockResolvedValue({ key: 'k', url: 'u', size: 1 }),
    getOutputKey: vi.fn((sessionId: string) => `outputs/${sessionId}.png`),
    deleteFile: vi.fn().mockResolvedValue(undefined),
  },
}));

// Mock templates
vi.mock('./background-template.service.js', () => ({
  backgroundTemplateService: {
    resolve: vi.fn(),
  },
}));

// Mock session persistence
vi.mock('../controllers/sessions.controller.js', () => ({
  sessionsController: {
    markCompleted: vi.fn(),
    markFailed: vi.fn().mockResolvedValue(null),
  },
}));

import { CollagePipelineService } from './collage-pipeline.service.js';
import { getConfig } from '../config/index.js';
import { createTestConfig } from '../test-helpers/config.js';
import { storageService } from './storage.service.js';
import { backgroundTemplateService } from './background-template.service.js';
import { sessionsController } from '../controllers/sessions.controller.js';
import { providerRegistry } from '../providers/provider-registry.js';
import { sharpImageTransformProvider } from '../providers/implementations/sharp-image-transform.provider.js';
import { ConflictError, ExternalApiError } from '../utils/errors.js';
import type { BackgroundRemovalProvider } from '../providers/interfaces/background-removal.provider.js';
import type { CollageSession } from '../db/schema.js';

const SESSION_ID = '0c8f3a9e-5b2d-4e61-8a7f-1d2c3b4a5e6f';

function makeSession(overrides: Partial<CollageSession> = {}): CollageSession {
  return {
    id: SESSION_ID,
    ownerId: 'owner-1',
    channelId: null,
    threadRef: null,
    status: 'processing',
    image1Path: `inputs/${SESSION_ID}_1.png`,
    image2Path: `inputs/${SESSION_ID}_2.png`,
    outputPath: null,
    backgroundName: 'base_mint_green.png',
    overlayColor: null,
    errorMessage: null,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

async function rawPng(width: number, height: number, pixel: number[]): Promise<Buffer> {
  const channels = pixel.length === 4 ? 4 : 3;
  const data = Buffer.alloc(width * height * channels);
  for (let i = 0; i < data.length; i += channels) {
    pixel.forEach((value, c) => {
      data[i + c] = value;
    });
  }
  return sharp(data, { raw: { width, height, channels } }).png().toBuffer();
}

describe('CollagePipelineService', () => {
  let service: CollagePipelineService;
  let productUpload: Buffer;
  let variantsUpload: Buffer;
  let whiteCutout: Buffer;
  let emptyCutout: Buffer;
  let template: Buffer;

  const remover: BackgroundRemovalProvider = {
    providerId: 'fake',
    removeBackground: vi.fn(),
    isAvailable: vi.fn().mockReturnValue(true),
  };

  beforeAll(async () => {
    productUpload = await rawPng(30, 30, [10, 20, 30]);
    variantsUpload = await rawPng(60, 40, [255, 0, 0]);
    whiteCutout = await rawPng(30, 30, [255, 255, 255, 255]);
    emptyCutout = await rawPng(30, 30, [255, 255, 255, 0]);
    template = await rawPng(300, 150, [200, 200, 200]);
  });

  beforeEach(() => {
    service = new CollagePipelineService();
    vi.clearAllMocks();

    vi.mocked(getConfig).mockReturnValue(
      createTestConfig({ CANVAS_WIDTH: '200', CANVAS_HEIGHT: '100', BORDER_THICKNESS: '10', GAP_THICKNESS: '4' })
    );

    providerRegistry.clear();
    providerRegistry.register('backgroundRemoval', remover);
    providerRegistry.register('imageTransform', sharpImageTransformProvider);

    vi.mocked(storageService.downloadBuffer).mockImplementation(async (key: string) =>
      key.endsWith('_1.png') ? productUpload : variantsUpload
    );
    vi.mocked(backgroundTemplateService.resolve).mockImplementation(async (name?: string) => ({
      name: name ?? 'base_cream.png',
      buffer: template,
    }));
    vi.mocked(sessionsController.markCompleted).mockImplementation(async (id, outputPath, overlayName) =>
      makeSession({ id, status: 'completed', outputPath, overlayColor: overlayName })
    );
    vi.mocked(remover.removeBackground).mockResolvedValue(whiteCutout);
  });

  it('should render, upload and complete the session', async () => {
    const result = await service.run(makeSession());

    expect(remover.removeBackground).toHaveBeenCalledWith(productUpload, {
      requestId: SESSION_ID,
      mimeType: 'image/png',
    });
    expect(backgroundTemplateService.resolve).toHaveBeenCalledWith('base_mint_green.png');
    expect(result.outputPath).toBe(`outputs/${SESSION_ID}.png`);
    expect(result.backgroundName).toBe('base_mint_green.png');
    expect(result.session.status).toBe('completed');
    expect(sessionsController.markCompleted).toHaveBeenCalledWith(
      SESSION_ID,
      `outputs/${SESSION_ID}.png`,
      'bottle_green'
    );
    expect(sessionsController.markFailed).not.toHaveBeenCalled();
  });

  it('should upload a PNG of the configured canvas size', async () => {
    await service.run(makeSession());

    const call = vi.mocked(storageService.uploadBuffer).mock.calls[0];
    expect(call?.[1]).toBe(`outputs/${SESSION_ID}.png`);
    expect(call?.[2]).toBe('image/png');

    const meta = await sharp(call?.[0]).metadata();
    expect(meta.format).toBe('png');
    expect(meta.width).toBe(200);
    expect(meta.height).toBe(100);
    expect(meta.channels).toBe(3);
  });

  it('should pick the dark overlay for a light product', async () => {
    const result = await service.run(makeSession());
    expect(result.overlayColor.name).toBe('bottle_green');
  });

  it('should fall back to the first palette overlay when the cutout is empty', async () => {
    vi.mocked(remover.removeBackground).mockResolvedValue(emptyCutout);

    const result = await service.run(makeSession());

    expect(result.overlayColor.name).toBe('sky_blue');
    expect(sessionsController.markCompleted).toHaveBeenCalledWith(SESSION_ID, `outputs/${SESSION_ID}.png`, 'sky_blue');
  });

  it('should let the template service choose when the session has no template', async () => {
    const result = await service.run(makeSession({ backgroundName: null }));

    expect(backgroundTemplateService.resolve).toHaveBeenCalledWith(undefined);
    expect(result.backgroundName).toBe('base_cream.png');
  });

  it('should mark the session failed when background removal fails', async () => {
    vi.mocked(remover.removeBackground).mockRejectedValue(new ExternalApiError('Replicate', 'boom'));

    await expect(service.run(makeSession())).rejects.toThrow('Replicate: boom');

    expect(sessionsController.markFailed).toHaveBeenCalledWith(SESSION_ID, 'Replicate: boom');
    expect(storageService.uploadBuffer).not.toHaveBeenCalled();
    expect(sessionsController.markCompleted).not.toHaveBeenCalled();
  });

  it('should mark the session failed when an upload is missing', async () => {
    await expect(service.run(makeSession({ image2Path: null }))).rejects.toThrow(
      'Session is missing uploaded images'
    );

    expect(sessionsController.markFailed).toHaveBeenCalledWith(SESSION_ID, 'Session is missing uploaded images');
    expect(storageService.downloadBuffer).not.toHaveBeenCalled();
  });

  it('should mark the session failed when the cutout is not an image', async () => {
    vi.mocked(remover.removeBackground).mockResolvedValue(Buffer.from('not an image'));

    await expect(service.run(makeSession())).rejects.toMatchObject({ code: 'INVALID_IMAGE' });
    expect(sessionsController.markFailed).toHaveBeenCalledTimes(1);
  });

  it('should remove the uploaded output when the session was cancelled mid-render', async () => {
    vi.mocked(sessionsController.markCompleted).mockRejectedValue(
      new ConflictError(`Session ${SESSION_ID} is no longer processing`)
    );

    await expect(service.run(makeSession())).rejects.toThrow(ConflictError);

    expect(storageService.uploadBuffer).toHaveBeenCalledTimes(1);
    expect(storageService.deleteFile).toHaveBeenCalledWith(`outputs/${SESSION_ID}.png`);
  });

  it('should keep the output when completion fails for another reason', async () => {
    vi.mocked(sessionsController.markCompleted).mockRejectedValue(new Error('connection reset'));

    await expect(service.run(makeSession())).rejects.toThrow('connection reset');

    expect(storageService.deleteFile).not.toHaveBeenCalled();
  });
});
