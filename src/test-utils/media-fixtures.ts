/**
 * Media Fixtures for Unit Tests
 *
 * Builds small Y4M and PNM files in memory or in a temporary directory.
 * Frame payloads are filled with a byte derived from the frame index so a
 * decoded frame can be traced back to where it came from.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { PixelFormat } from '../types/media';
import { frameByteLength } from '../utils/pixelFormat';

export interface Y4mFixtureOptions {
  width?: number;
  height?: number;
  frameCount: number;
  /** Header `F` value, e.g. '25:1'; omitted from the header when null */
  rate?: string | null;
  colorSpace?: string;
  /** Extra header tokens */
  extraTags?: string[];
}

const COLOR_SPACE_FORMATS: Record<string, PixelFormat> = {
  '420jpeg': 'yuv420p',
  '444': 'yuv444p',
  mono: 'gray8',
};

/**
 * Byte every sample of frame `index` is filled with
 */
export function fillByteForFrame(index: number): number {
  return (index * 7 + 1) % 256;
}

export function buildY4mHeader(options: Y4mFixtureOptions): string {
  const { width = 4, height = 2, rate = '25:1', colorSpace, extraTags = [] } =
    options;
  const tokens = ['YUV4MPEG2', `W${width}`, `H${height}`];
  if (rate !== null) tokens.push(`F${rate}`);
  tokens.push('Ip', 'A1:1');
  if (colorSpace) tokens.push(`C${colorSpace}`);
  tokens.push(...extraTags);
  return `${tokens.join(' ')}\n`;
}

/**
 * Build a complete Y4M byte stream
 */
export function buildY4m(options: Y4mFixtureOptions): Buffer {
  const { width = 4, height = 2, colorSpace = '420jpeg' } = options;
  const format = COLOR_SPACE_FORMATS[colorSpace] ?? 'yuv420p';
  const size = frameByteLength(format, width, height);

  const parts: Buffer[] = [Buffer.from(buildY4mHeader(options), 'ascii')];
  for (let i = 0; i < options.frameCount; i++) {
    parts.push(Buffer.from('FRAME\n', 'ascii'));
    parts.push(Buffer.alloc(size, fillByteForFrame(i)));
  }
  return Buffer.concat(parts);
}

/**
 * Build a binary PNM image with a comment in its header
 */
export function buildPnm(
  magic: 'P5' | 'P6',
  width: number,
  height: number,
  raster: number[],
  maxval = 255
): Buffer {
  const header = `${magic}\n# fixture\n${width} ${height}\n${maxval}\n`;
  return Buffer.concat([Buffer.from(header, 'ascii'), Buffer.from(raster)]);
}

/**
 * Temporary directory removed by `cleanup()`
 */
export async function createTempDir(): Promise<{
  path: (name: string) => string;
  write: (name: string, data: Uint8Array) => Promise<string>;
  cleanup: () => Promise<void>;
}> {
  const dir = await mkdtemp(join(tmpdir(), 'media-pipeline-'));
  return {
    path: (name) => join(dir, name),
    write: async (name, data) => {
      const file = join(dir, name);
      await writeFile(file, data);
      return file;
    },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
