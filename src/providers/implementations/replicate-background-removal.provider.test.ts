import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock config
vi.mock('../../config/index.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../config/index.js')>();
  return { ...actual, getConfig: vi.fn() };
});

// Mock logger
vi.mock('../../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

// Mock fetch globally
const mockFetch = vi.fn<typeof fetch>();
global.fetch = mockFetch;

import { ReplicateBackgroundRemovalProvider, coerceOutputUrl } from './replicate-background-removal.provider.js';
import { getConfig } from '../../config/index.js';
import { createTestConfig } from '../../test-helpers/config.js';
import { ExternalApiError } from '../../utils/errors.js';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);
const RESULT_BYTES = new Uint8Array([1, 2, 3, 4]);

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function requestAt(index: number): { url: string; init: RequestInit | undefined } {
  const call = mockFetch.mock.calls[index];
  return { url: String(call?.[0]), init: call?.[1] };
}

describe('ReplicateBackgroundRemovalProvider', () => {
  let provider: ReplicateBackgroundRemovalProvider;

  beforeEach(() => {
    provider = new ReplicateBackgroundRemovalProvider();
    mockFetch.mockReset();
    vi.mocked(getConfig).mockReturnValue(createTestConfig());
  });

  describe('providerId', () => {
    it('should have correct provider ID', () => {
      expect(provider.providerId).toBe('replicate');
    });
  });

  describe('isAvailable', () => {
    it('should return true when a token is configured', () => {
      expect(provider.isAvailable()).toBe(true);
    });

    it('should return false without a token', () => {
      vi.mocked(getConfig).mockReturnValue(createTestConfig({ REPLICATE_API_TOKEN: '' }));
      expect(provider.isAvailable()).toBe(false);
    });

    it('should return false when config throws', () => {
      vi.mocked(getConfig).mockImplementation(() => {
        throw new Error('Config error');
      });
      expect(provider.isAvailable()).toBe(false);
    });
  });

  describe('removeBackground', () => {
    it('should fail fast without a token', async () => {
      vi.mocked(getConfig).mockReturnValue(createTestConfig({ REPLICATE_API_TOKEN: '' }));

      await expect(provider.removeBackground(PNG_BYTES)).rejects.toThrow(
        'Replicate: API token not configured (REPLICATE_API_TOKEN)'
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should create a prediction against the model and download the output', async () => {
      mockFetch
        .mockResolvedValueOnce(
          jsonResponse({ id: 'p1', status: 'succeeded', output: 'https://replicate.delivery/p1/out.png' }, 201)
        )
        .mockResolvedValueOnce(new Response(RESULT_BYTES));

      const result = await provider.removeBackground(PNG_BYTES);

      expect(Array.from(result)).toEqual([1, 2, 3, 4]);
      expect(mockFetch).toHaveBeenCalledTimes(2);

      const create = requestAt(0);
      expect(create.url).toBe('https://api.replicate.com/v1/models/cjwbw/rembg/predictions');
      expect(create.init?.method).toBe('POST');
      expect(create.init?.headers).toEqual({
        Authorization: 'Bearer test-token',
        'Content-Type': 'application/json',
        Prefer: 'wait',
      });
      const body = JSON.parse(String(create.init?.body));
      expect(body.version).toBeUndefined();
      expect(body.input.image).toBe(`data:image/png;base64,${PNG_BYTES.toString('base64')}`);

      expect(requestAt(1).url).toBe('https://replicate.delivery/p1/out.png');
    });

    it('should use the pinned version endpoint when configured', async () => {
      vi.mocked(getConfig).mockReturnValue(createTestConfig({ REPLICATE_MODEL_VERSION: 'abc123' }));
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ id: 'p1', status: 'succeeded', output: 'https://x/out.png' }, 201))
        .mockResolvedValueOnce(new Response(RESULT_BYTES));

      await provider.removeBackground(PNG_BYTES, { mimeType: 'image/jpeg' });

      const create = requestAt(0);
      expect(create.url).toBe('https://api.replicate.com/v1/predictions');
      const body = JSON.parse(String(create.init?.body));
      expect(body.version).toBe('abc123');
      expect(body.input.image.startsWith('data:image/jpeg;base64,')).toBe(true);
    });

    it('should poll until the prediction finishes', async () => {
      mockFetch
        .mockResolvedValueOnce(
          jsonResponse(
            { id: 'p2', status: 'starting', urls: { get: 'https://api.replicate.com/v1/predictions/p2' } },
            201
          )
        )
        .mockResolvedValueOnce(jsonResponse({ id: 'p2', status: 'processing' }))
        .mockResolvedValueOnce(
          jsonResponse({ id: 'p2', status: 'succeeded', output: ['https://x/mask.png', 'https://x/final.png'] })
        )
        .mockResolvedValueOnce(new Response(RESULT_BYTES));

      const result = await provider.removeBackground(PNG_BYTES);

      expect(result.length).toBe(4);
      expect(mockFetch).toHaveBeenCalledTimes(4);
      expect(requestAt(1).url).toBe('https://api.replicate.com/v1/predictions/p2');
      expect(requestAt(1).init?.headers).toEqual({ Authorization: 'Bearer test-token' });
      expect(requestAt(3).url).toBe('https://x/final.png');
    });

    it('should surface a failed prediction', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ id: 'p3', status: 'starting' }, 201))
        .mockResolvedValueOnce(jsonResponse({ id: 'p3', status: 'failed', error: 'CUDA out of memory' }));

      await expect(provider.removeBackground(PNG_BYTES)).rejects.toThrow(
        'Replicate: Prediction p3 failed: CUDA out of memory'
      );
      expect(requestAt(1).url).toBe('https://api.replicate.com/v1/predictions/p3');
    });

    it('should give up after the configured number of polls', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ id: 'p4', status: 'starting' }, 201));
      mockFetch.mockImplementation(async () => jsonResponse({ id: 'p4', status: 'processing' }));

      await expect(provider.removeBackground(PNG_BYTES)).rejects.toThrow(
        'Replicate: Prediction p4 timed out after polling'
      );
      // create + 3 polls
      expect(mockFetch).toHaveBeenCalledTimes(4);
    });

    it('should retry on server errors', async () => {
      mockFetch
        .mockResolvedValueOnce(new Response('upstream down', { status: 503 }))
        .mockResolvedValueOnce(jsonResponse({ id: 'p5', status: 'succeeded', output: 'https://x/out.png' }, 201))
        .mockResolvedValueOnce(new Response(RESULT_BYTES));

      const result = await provider.removeBackground(PNG_BYTES);

      expect(result.length).toBe(4);
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('should not retry client errors', async () => {
      mockFetch.mockResolvedValueOnce(new Response('invalid input', { status: 422 }));

      const error = await provider.removeBackground(PNG_BYTES).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExternalApiError);
      expect(error).toMatchObject({ statusCode: 502, message: 'Replicate: API error (HTTP 422): invalid input' });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should reject a payload that is not a prediction', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ detail: 'nope' }, 201));

      await expect(provider.removeBackground(PNG_BYTES)).rejects.toThrow('Unexpected prediction payload');
    });
  });

  describe('coerceOutputUrl', () => {
    it('should accept a string or take the last list entry', () => {
      expect(coerceOutputUrl('https://x/a.png')).toBe('https://x/a.png');
      expect(coerceOutputUrl(['https://x/a.png', 'https://x/b.png'])).toBe('https://x/b.png');
      expect(coerceOutputUrl([])).toBeNull();
      expect(coerceOutputUrl(null)).toBeNull();
    });
  });
});
