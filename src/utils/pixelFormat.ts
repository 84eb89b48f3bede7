/**
 * Pixel format helpers
 *
 * Frame copying and conversion to packed RGB for display.
 * YUV conversion uses BT.601 coefficients; limited-range samples are
 * expanded to full range first.
 */

import type {
  ColorRange,
  DisplayFrame,
  Frame,
  PixelFormat,
} from '../types/media';

/**
 * Number of bytes one frame occupies in the given format
 */
export function frameByteLength(
  format: PixelFormat,
  width: number,
  height: number
): number {
  const pixels = width * height;
  switch (format) {
    case 'rgb24':
    case 'bgr24':
    case 'yuv444p':
      return pixels * 3;
    case 'gray8':
      return pixels;
    case 'yuv420p':
      return pixels + 2 * chromaWidth(width) * chromaHeight(height);
  }
}

function chromaWidth(width: number): number {
  return Math.ceil(width / 2);
}

function chromaHeight(height: number): number {
  return Math.ceil(height / 2);
}

/**
 * Copy a frame so the result shares no storage with the original.
 * `new Uint8Array(typedArray)` always copies, even when handed a Buffer.
 */
export function copyFrame<T extends Frame>(frame: T): T {
  return { ...frame, data: new Uint8Array(frame.data) };
}

function clampByte(value: number): number {
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

function expandLuma(y: number, range: ColorRange): number {
  return range === 'limited' ? ((y - 16) * 255) / 219 : y;
}

function expandChroma(c: number, range: ColorRange): number {
  return range === 'limited' ? ((c - 128) * 255) / 224 : c - 128;
}

function writeYuvPixel(
  out: Uint8Array,
  offset: number,
  y: number,
  u: number,
  v: number,
  range: ColorRange
): void {
  const luma = expandLuma(y, range);
  const cb = expandChroma(u, range);
  const cr = expandChroma(v, range);

  out[offset] = clampByte(luma + 1.402 * cr);
  out[offset + 1] = clampByte(luma - 0.344136 * cb - 0.714136 * cr);
  out[offset + 2] = clampByte(luma + 1.772 * cb);
}

/**
 * Convert any decoded frame to packed RGB.
 * An rgb24 frame is copied unchanged.
 */
export function toDisplayFrame(frame: Frame): DisplayFrame {
  const { width, height, data } = frame;
  const expected = frameByteLength(frame.format, width, height);
  if (data.length < expected) {
    throw new Error(
      `Frame ${frame.index} has ${data.length} bytes, expected ${expected} for ${frame.format} ${width}x${height}`
    );
  }

  const pixels = width * height;
  const rgb = new Uint8Array(pixels * 3);
  const range = frame.colorRange ?? 'full';

  switch (frame.format) {
    case 'rgb24':
      rgb.set(data.subarray(0, pixels * 3));
      break;

    case 'bgr24':
      for (let i = 0; i < pixels; i++) {
        const o = i * 3;
        rgb[o] = data[o + 2];
        rgb[o + 1] = data[o + 1];
        rgb[o + 2] = data[o];
      }
      break;

    case 'gray8':
      for (let i = 0; i < pixels; i++) {
        const o = i * 3;
        rgb[o] = data[i];
        rgb[o + 1] = data[i];
        rgb[o + 2] = data[i];
      }
      break;

    case 'yuv444p':
      for (let i = 0; i < pixels; i++) {
        writeYuvPixel(
          rgb,
          i * 3,
          data[i],
          data[pixels + i],
          data[2 * pixels + i],
          range
        );
      }
      break;

    case 'yuv420p': {
      const cw = chromaWidth(width);
      const uPlane = pixels;
      const vPlane = pixels + cw * chromaHeight(height);
      for (let row = 0; row < height; row++) {
        const chromaRow = (row >> 1) * cw;
        for (let col = 0; col < width; col++) {
          const chroma = chromaRow + (col >> 1);
          writeYuvPixel(
            rgb,
            (row * width + col) * 3,
            data[row * width + col],
            data[uPlane + chroma],
            data[vPlane + chroma],
            range
          );
        }
      }
      break;
    }
  }

  return {
    index: frame.index,
    timestamp: frame.timestamp,
    width,
    height,
    format: 'rgb24',
    data: rgb,
  };
}
