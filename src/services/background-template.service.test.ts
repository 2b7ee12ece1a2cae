import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import sharp from 'sharp';
import {
  BackgroundTemplateService,
  renderPatternBackground,
  seededRandom,
} from './background-template.service.js';
import { ConfigurationError, MissingAssetError } from '../utils/errors.js';

// Mock logger
vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

const NAMES = ['base_a.png', 'base_b.png', 'base_c.png', 'base_d.png', 'base_e.png'];

describe('BackgroundTemplateService', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'templates-'));
    await writeFile(path.join(dir, 'base_a.png'), Buffer.from('template-a'));
    await writeFile(path.join(dir, 'base_c.png'), Buffer.from('template-c'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('resolveName', () => {
    it('should accept a name from the set', () => {
      const service = new BackgroundTemplateService({ backgroundsDir: dir, backgroundNames: NAMES });
      expect(service.resolveName('base_d.png')).toBe('base_d.png');
    });

    it('should reject names outside the set', () => {
      const service = new BackgroundTemplateService({ backgroundsDir: dir, backgroundNames: NAMES });
      expect(() => service.resolveName('../secrets.png')).toThrow(MissingAssetError);
    });

    it('should pick by the random source when no name is given', () => {
      const values = [0, 0.5, 0.9999];
      const service = new BackgroundTemplateService(
        { backgroundsDir: dir, backgroundNames: NAMES },
        () => values.shift() ?? 0
      );

      expect(service.resolveName()).toBe('base_a.png');
      expect(service.resolveName()).toBe('base_c.png');
      expect(service.resolveName()).toBe('base_e.png');
    });

    it('should throw when no templates are configured', () => {
      const service = new BackgroundTemplateService({ backgroundsDir: dir, backgroundNames: [] });
      expect(() => service.resolveName()).toThrow(ConfigurationError);
    });
  });

  describe('resolveAvailableName', () => {
    it('should accept a named template whose file exists', async () => {
      const service = new BackgroundTemplateService({ backgroundsDir: dir, backgroundNames: NAMES });

      expect(await service.resolveAvailableName('base_c.png')).toBe('base_c.png');
    });

    it('should reject a configured template with no file', async () => {
      const service = new BackgroundTemplateService({ backgroundsDir: dir, backgroundNames: NAMES });

      await expect(service.resolveAvailableName('base_b.png')).rejects.toMatchObject({
        statusCode: 404,
        code: 'MISSING_ASSET',
        asset: 'base_b.png',
        message: 'Background template file not found: base_b.png',
      });
    });

    it('should pick only among templates on disk', async () => {
      const values = [0, 0.6];
      const service = new BackgroundTemplateService(
        { backgroundsDir: dir, backgroundNames: NAMES },
        () => values.shift() ?? 0
      );

      expect(await service.resolveAvailableName()).toBe('base_a.png');
      expect(await service.resolveAvailableName()).toBe('base_c.png');
    });

    it('should fail when no template file exists', async () => {
      const empty = path.join(dir, 'empty');
      const service = new BackgroundTemplateService({ backgroundsDir: empty, backgroundNames: NAMES });

      await expect(service.resolveAvailableName()).rejects.toMatchObject({
        statusCode: 404,
        message: 'No background template files found, run npm run generate:backgrounds',
      });
    });
  });

  describe('listNames', () => {
    it('should return a copy of the configured names', () => {
      const service = new BackgroundTemplateService({ backgroundsDir: dir, backgroundNames: NAMES });
      const names = service.listNames();
      names.pop();

      expect(service.listNames()).toEqual(NAMES);
    });
  });

  describe('load', () => {
    it('should read the template file', async () => {
      const service = new BackgroundTemplateService({ backgroundsDir: dir, backgroundNames: NAMES });
      const buffer = await service.load('base_a.png');

      expect(buffer.toString()).toBe('template-a');
    });

    it('should throw MissingAssetError when the file is absent', async () => {
      const service = new BackgroundTemplateService({ backgroundsDir: dir, backgroundNames: NAMES });

      await expect(service.load('base_b.png')).rejects.toMatchObject({
        code: 'MISSING_ASSET',
        asset: 'base_b.png',
      });
    });
  });

  describe('resolve', () => {
    it('should return the chosen name with its contents', async () => {
      const service = new BackgroundTemplateService(
        { backgroundsDir: dir, backgroundNames: NAMES },
        () => 0.45
      );

      const template = await service.resolve();

      expect(template.name).toBe('base_c.png');
      expect(template.buffer.toString()).toBe('template-c');
    });
  });

  describe('missingTemplates', () => {
    it('should list configured names without a file', async () => {
      const service = new BackgroundTemplateService({ backgroundsDir: dir, backgroundNames: NAMES });

      expect(await service.missingTemplates()).toEqual(['base_b.png', 'base_d.png', 'base_e.png']);
    });
  });
});

describe('seededRandom', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = seededRandom('light_pink');
    const b = seededRandom('light_pink');

    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should differ between seeds', () => {
    expect(seededRandom('mint_green')()).not.toBe(seededRandom('lavender')());
  });
});

describe('renderPatternBackground', () => {
  it('should render an RGB PNG of the requested size', async () => {
    const png = await renderPatternBackground('#B0E0E6', 'powder_blue', { width: 64, height: 36 });
    const meta = await sharp(png).metadata();

    expect(meta.format).toBe('png');
    expect(meta.width).toBe(64);
    expect(meta.height).toBe(36);
    expect(meta.channels).toBe(3);
  });

  it('should be deterministic per seed', async () => {
    const size = { width: 120, height: 80 };
    const first = await renderPatternBackground('#FFB6C1', 'light_pink', size);
    const second = await renderPatternBackground('#FFB6C1', 'light_pink', size);

    expect(first.equals(second)).toBe(true);
  });

  it('should reject malformed colours', async () => {
    await expect(renderPatternBackground('pink', 'x', { width: 10, height: 10 })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
