/**
 * YUV4MPEG2 (Y4M) parsing
 *
 * Y4M is an uncompressed container: one ASCII header line followed by
 * frames, each introduced by a `FRAME` line.
 *
 *   YUV4MPEG2 W640 H480 F30000:1001 Ip A1:1 C420jpeg XCOLORRANGE=LIMITED\n
 *   FRAME\n<payload>FRAME\n<payload>...
 *
 * Used both for indexed files on disk and for ffmpeg's `yuv4mpegpipe`
 * output when capturing from a camera.
 */

import type { ColorRange, PixelFormat } from '../types/media';
import { frameByteLength } from './pixelFormat';

export const Y4M_SIGNATURE = 'YUV4MPEG2';
export const Y4M_FRAME_MARKER = 'FRAME';

/** Header and frame lines longer than this mean the input is not Y4M */
export const MAX_Y4M_LINE_LENGTH = 4096;

const NEWLINE = 0x0a;

export interface Y4mHeader {
  width: number;
  height: number;
  /** Frames per second, or null when the header omits or zeroes it */
  frameRate: number | null;
  format: PixelFormat;
  colorRange?: ColorRange;
}

const COLOR_SPACES: Record<string, PixelFormat> = {
  '420jpeg': 'yuv420p',
  '420paldv': 'yuv420p',
  '420mpeg2': 'yuv420p',
  '420': 'yuv420p',
  '444': 'yuv444p',
  mono: 'gray8',
};

function parseDimension(value: string, name: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid Y4M ${name}: ${value}`);
  }
  return parsed;
}

function parseFrameRate(value: string): number | null {
  const [num, den] = value.split(':').map((part) => Number.parseInt(part, 10));
  if (!num || !den || num <= 0 || den <= 0) {
    return null;
  }
  return num / den;
}

/**
 * Parse the stream header line (without its trailing newline)
 */
export function parseY4mHeader(line: string): Y4mHeader {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== Y4M_SIGNATURE) {
    throw new Error('Missing YUV4MPEG2 signature');
  }

  let width: number | null = null;
  let height: number | null = null;
  let frameRate: number | null = null;
  let format: PixelFormat = 'yuv420p';
  let colorRange: ColorRange | undefined;

  for (const token of tokens.slice(1)) {
    const tag = token[0];
    const value = token.slice(1);
    switch (tag) {
      case 'W':
        width = parseDimension(value, 'width');
        break;
      case 'H':
        height = parseDimension(value, 'height');
        break;
      case 'F':
        frameRate = parseFrameRate(value);
        break;
      case 'C': {
        const mapped = COLOR_SPACES[value];
        if (!mapped) {
          throw new Error(`Unsupported Y4M colour space: ${value}`);
        }
        format = mapped;
        break;
      }
      case 'X':
        if (value === 'COLORRANGE=LIMITED') colorRange = 'limited';
        else if (value === 'COLORRANGE=FULL') colorRange = 'full';
        break;
      default:
        // Interlacing, aspect ratio and unknown tags do not affect decoding
        break;
    }
  }

  if (width === null || height === null) {
    throw new Error('Y4M header is missing W or H');
  }

  return { width, height, frameRate, format, colorRange };
}

/**
 * Payload size of one frame described by the header
 */
export function y4mFrameSize(header: Y4mHeader): number {
  return frameByteLength(header.format, header.width, header.height);
}

/**
 * Incremental parser for a Y4M byte stream.
 *
 * Chunks may split headers and payloads anywhere. Each completed frame
 * payload is handed out as its own Buffer.
 */
export class Y4mStreamParser {
  private pending: Buffer = Buffer.alloc(0);
  private header: Y4mHeader | null = null;
  private frameSize = 0;

  constructor(
    private readonly onHeader: (header: Y4mHeader) => void,
    private readonly onFrame: (payload: Buffer) => void
  ) {}

  getHeader(): Y4mHeader | null {
    return this.header;
  }

  /**
   * Feed bytes; throws when the stream is not valid Y4M
   */
  push(chunk: Buffer): void {
    this.pending =
      this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

    while (this.pending.length > 0) {
      const newline = this.pending.indexOf(NEWLINE);
      if (newline < 0) {
        if (this.pending.length > MAX_Y4M_LINE_LENGTH) {
          throw new Error('Y4M line exceeds maximum length');
        }
        return;
      }

      const line = this.pending.toString('ascii', 0, newline);

      if (!this.header) {
        this.header = parseY4mHeader(line);
        this.frameSize = y4mFrameSize(this.header);
        this.pending = this.pending.subarray(newline + 1);
        this.onHeader(this.header);
        continue;
      }

      if (!line.startsWith(Y4M_FRAME_MARKER)) {
        throw new Error(`Expected FRAME marker, got "${line.slice(0, 16)}"`);
      }

      const payloadStart = newline + 1;
      const payloadEnd = payloadStart + this.frameSize;
      if (this.pending.length < payloadEnd) {
        return;
      }

      const payload = Buffer.from(this.pending.subarray(payloadStart, payloadEnd));
      this.pending = this.pending.subarray(payloadEnd);
      this.onFrame(payload);
    }
  }
}
