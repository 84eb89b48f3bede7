/**
 * Binary PNM still images (P5 greyscale, P6 RGB), 8 bits per sample.
 */

import type { DisplayFrame, PixelFormat } from '../types/media';

export interface PnmImage {
  width: number;
  height: number;
  format: Extract<PixelFormat, 'gray8' | 'rgb24'>;
  data: Uint8Array;
}

function isWhitespace(byte: number): boolean {
  // space, \t, \n, \v, \f, \r
  return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);
}

/**
 * Decode a P5 or P6 image
 */
export function decodePnm(bytes: Uint8Array): PnmImage {
  let offset = 0;

  const nextToken = (): string => {
    for (;;) {
      while (offset < bytes.length && isWhitespace(bytes[offset])) offset++;
      if (bytes[offset] !== 0x23) break;
      // '#' comment runs to end of line
      while (offset < bytes.length && bytes[offset] !== 0x0a) offset++;
    }
    const start = offset;
    while (offset < bytes.length && !isWhitespace(bytes[offset])) offset++;
    if (start === offset) {
      throw new Error('Truncated PNM header');
    }
    return String.fromCharCode(...bytes.subarray(start, offset));
  };

  const magic = nextToken();
  if (magic !== 'P5' && magic !== 'P6') {
    throw new Error(`Unsupported PNM type: ${magic}`);
  }

  const width = Number.parseInt(nextToken(), 10);
  const height = Number.parseInt(nextToken(), 10);
  const maxval = Number.parseInt(nextToken(), 10);
  if (!(width > 0) || !(height > 0)) {
    throw new Error(`Invalid PNM dimensions: ${width}x${height}`);
  }
  if (!(maxval > 0) || maxval > 255) {
    throw new Error(`Unsupported PNM maxval: ${maxval}`);
  }

  // Exactly one whitespace byte separates the header from the raster
  offset += 1;

  const format = magic === 'P5' ? 'gray8' : 'rgb24';
  const channels = format === 'gray8' ? 1 : 3;
  const length = width * height * channels;
  if (bytes.length - offset < length) {
    throw new Error(
      `PNM raster is truncated: expected ${length} bytes, found ${bytes.length - offset}`
    );
  }

  const data = new Uint8Array(bytes.subarray(offset, offset + length));
  if (maxval !== 255) {
    for (let i = 0; i < data.length; i++) {
      data[i] = Math.round((data[i] * 255) / maxval);
    }
  }

  return { width, height, format, data };
}

/**
 * Encode a display frame as a binary PPM (P6)
 */
export function encodePpm(frame: DisplayFrame): Buffer {
  const header = Buffer.from(`P6\n${frame.width} ${frame.height}\n255\n`, 'ascii');
  return Buffer.concat([header, frame.data.subarray(0, frame.width * frame.height * 3)]);
}
