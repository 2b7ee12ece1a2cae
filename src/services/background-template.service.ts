import { access, readFile } from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { MissingAssetError, ConfigurationError } from '../utils/errors.js';
import { hexToRgb, rgbToHex } from '../utils/color.js';
import type { Rgb, Size } from '../types/collage.types.js';

const logger = createChildLogger({ service: 'background-template' });

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export interface TemplateSettings {
  backgroundsDir: string;
  backgroundNames: string[];
}

export interface LoadedTemplate {
  name: string;
  buffer: Buffer;
}

/**
 * BackgroundTemplateService - named background templates on disk
 */
export class BackgroundTemplateService {
  constructor(
    private readonly settings?: TemplateSettings,
    private readonly random: RandomSource = Math.random
  ) {}

  private get assets(): TemplateSettings {
    return this.settings ?? getConfig().assets;
  }

  listNames(): string[] {
    return [...this.assets.backgroundNames];
  }

  /**
   * Validate an explicit name, or pick one at random from the set
   */
  resolveName(name?: string): string {
    const names = this.assets.backgroundNames;

    if (name !== undefined) {
      if (!names.includes(name)) {
        throw new MissingAssetError(name, `Unknown background template: ${name}`);
      }
      return name;
    }

    if (names.length === 0) {
      throw new ConfigurationError('No background templates configured');
    }
    return this.pick(names);
  }

  /**
   * Like resolveName, but only templates whose file is on disk qualify
   */
  async resolveAvailableName(name?: string): Promise<string> {
    const resolved = name === undefined ? undefined : this.resolveName(name);
    const missing = new Set(await this.missingTemplates());

    if (resolved !== undefined) {
      if (missing.has(resolved)) {
        throw new MissingAssetError(resolved, `Background template file not found: ${resolved}`);
      }
      return resolved;
    }

    const present = this.listNames().filter((candidate) => !missing.has(candidate));
    if (present.length === 0) {
      throw new MissingAssetError(
        this.assets.backgroundsDir,
        'No background template files found, run npm run generate:backgrounds'
      );
    }
    return this.pick(present);
  }

  private pick(names: string[]): string {
    return names[Math.min(Math.floor(this.random() * names.length), names.length - 1)];
  }

  async load(name: string): Promise<Buffer> {
    const resolved = this.resolveName(name);
    const filePath = path.resolve(this.assets.backgroundsDir, resolved);

    try {
      return await readFile(filePath);
    } catch (error) {
      logger.warn({ error, filePath }, 'Background template unreadable');
      throw new MissingAssetError(resolved, `Background template file not found: ${resolved}`);
    }
  }

  async resolve(name?: string): Promise<LoadedTemplate> {
    const resolved = this.resolveName(name);
    return { name: resolved, buffer: await this.load(resolved) };
  }

  /**
   * Configured names whose file is not readable
   */
  async missingTemplates(): Promise<string[]> {
    const { backgroundsDir, backgroundNames } = this.assets;
    const results = await Promise.all(
      backgroundNames.map(async (name) => {
        try {
          await access(path.resolve(backgroundsDir, name));
          return null;
        } catch {
          return name;
        }
      })
    );
    return results.filter((name): name is string => name !== null);
  }
}

export const backgroundTemplateService = new BackgroundTemplateService();

/**
 * mulberry32 PRNG seeded from a string (FNV-1a hash)
 */
export function seededRandom(seed: string): RandomSource {
  let state = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    state ^= seed.charCodeAt(i);
    state = Math.imul(state, 0x01000193);
  }

  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function shade({ r, g, b }: Rgb, factor: number): string {
  const apply = (c: number) =>
    factor < 0 ? Math.max(0, Math.floor(c * (1 + factor))) : Math.min(255, Math.floor(c + (255 - c) * factor));
  return rgbToHex({ r: apply(r), g: apply(g), b: apply(b) });
}

/**
 * Pastel background with scattered circles, triangles and lines.
 * Same colour, seed and size always produce the same PNG.
 */
export async function renderPatternBackground(colorHex: string, seed: string, size: Size): Promise<Buffer> {
  const base = hexToRgb(colorHex);
  const rand = seededRandom(seed);
  const int = (min: number, max: number) => min + Math.floor(rand() * (max - min + 1));
  const { width, height } = size;

  const shapes: string[] = [];

  const circleFill = shade(base, -0.1);
  for (let i = 0; i < 30; i++) {
    const cx = int(-50, width + 50);
    const cy = int(-50, height + 50);
    const radius = int(10, 60);
    shapes.push(`<circle cx="${cx}" cy="${cy}" r="${radius}" fill="${circleFill}"/>`);
  }

  const triangleFill = shade(base, 0.1);
  for (let i = 0; i < 20; i++) {
    const x = int(0, width);
    const y = int(0, height);
    const side = int(20, 80);
    const offset = rand() * 360;
    const points = [0, 1, 2]
      .map((k) => {
        const angle = ((offset + k * 120) * Math.PI) / 180;
        return `${(x + side * Math.cos(angle)).toFixed(2)},${(y + side * Math.sin(angle)).toFixed(2)}`;
      })
      .join(' ');
    shapes.push(`<polygon points="${points}" fill="${triangleFill}"/>`);
  }

  const lineStroke = shade(base, -0.08);
  for (let i = 0; i < 15; i++) {
    const x1 = int(-100, width + 100);
    const y1 = int(-100, height + 100);
    const length = int(100, 300);
    const angle = (rand() * 360 * Math.PI) / 180;
    const x2 = (x1 + length * Math.cos(angle)).toFixed(2);
    const y2 = (y1 + length * Math.sin(angle)).toFixed(2);
    const strokeWidth = int(2, 6);
    shapes.push(
      `<line x1="${x1}" y1="${y1}" x2="${x2}" y2="${y2}" stroke="${lineStroke}" stroke-width="${strokeWidth}"/>`
    );
  }

  const svg =
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
    `<rect width="100%" height="100%" fill="${rgbToHex(base)}"/>` +
    shapes.join('') +
    '</svg>';

  return sharp(Buffer.from(svg)).removeAlpha().png().toBuffer();
}
