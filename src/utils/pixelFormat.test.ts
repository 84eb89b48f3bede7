import { describe, expect, it } from 'vitest';
import type { Frame } from '../types/media';
import { copyFrame, frameByteLength, toDisplayFrame } from './pixelFormat';

function frame(overrides: Partial<Frame> & Pick<Frame, 'format' | 'data'>): Frame {
  return {
    index: 3,
    timestamp: 0.1,
    width: 2,
    height: 1,
    ...overrides,
  };
}

describe('frameByteLength', () => {
  it('sizes packed and planar formats', () => {
    expect(frameByteLength('rgb24', 4, 2)).toBe(24);
    expect(frameByteLength('gray8', 4, 2)).toBe(8);
    expect(frameByteLength('yuv444p', 4, 2)).toBe(24);
    expect(frameByteLength('yuv420p', 4, 2)).toBe(12);
  });

  it('rounds chroma planes up for odd dimensions', () => {
    // 3x3 luma + 2 * (2x2) chroma
    expect(frameByteLength('yuv420p', 3, 3)).toBe(17);
  });
});

describe('copyFrame', () => {
  it('does not share storage with the original', () => {
    const original = frame({ format: 'gray8', data: new Uint8Array([1, 2]) });
    const copy = copyFrame(original);

    original.data[0] = 99;

    expect(copy.data[0]).toBe(1);
    expect(copy.index).toBe(3);
  });

  it('copies Buffer-backed frames', () => {
    const buffer = Buffer.from([5, 6]);
    const copy = copyFrame(frame({ format: 'gray8', data: buffer }));

    buffer[1] = 0;

    expect(Array.from(copy.data)).toEqual([5, 6]);
  });
});

describe('toDisplayFrame', () => {
  it('copies rgb24 unchanged', () => {
    const data = new Uint8Array([1, 2, 3, 4, 5, 6]);
    const display = toDisplayFrame(frame({ format: 'rgb24', data }));

    expect(Array.from(display.data)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(display.data).not.toBe(data);
  });

  it('swaps bgr24 channels', () => {
    const display = toDisplayFrame(
      frame({ format: 'bgr24', data: new Uint8Array([1, 2, 3, 4, 5, 6]) })
    );
    expect(Array.from(display.data)).toEqual([3, 2, 1, 6, 5, 4]);
  });

  it('replicates gray8 into all channels', () => {
    const display = toDisplayFrame(
      frame({ format: 'gray8', data: new Uint8Array([10, 200]) })
    );
    expect(Array.from(display.data)).toEqual([10, 10, 10, 200, 200, 200]);
  });

  it('converts neutral full-range yuv420p to gray', () => {
    // 2x1: two luma samples, one U and one V sample
    const display = toDisplayFrame(
      frame({ format: 'yuv420p', data: new Uint8Array([128, 64, 128, 128]) })
    );
    expect(Array.from(display.data)).toEqual([128, 128, 128, 64, 64, 64]);
  });

  it('applies chroma and clamps', () => {
    // Y=0, U=128, V=255: R = 1.402 * 127 = 178.05, G and B clamp to 0
    const display = toDisplayFrame(
      frame({
        width: 1,
        format: 'yuv444p',
        data: new Uint8Array([0, 128, 255]),
      })
    );
    expect(Array.from(display.data)).toEqual([178, 0, 0]);
  });

  it('expands limited range to full range', () => {
    const display = toDisplayFrame(
      frame({
        format: 'yuv444p',
        colorRange: 'limited',
        data: new Uint8Array([16, 235, 128, 128, 128, 128]),
      })
    );
    expect(Array.from(display.data)).toEqual([0, 0, 0, 255, 255, 255]);
  });

  it('keeps index and timestamp', () => {
    const display = toDisplayFrame(
      frame({ format: 'gray8', data: new Uint8Array([0, 0]) })
    );
    expect(display.index).toBe(3);
    expect(display.timestamp).toBe(0.1);
    expect(display.format).toBe('rgb24');
  });

  it('rejects short buffers', () => {
    expect(() =>
      toDisplayFrame(frame({ format: 'rgb24', data: new Uint8Array(5) }))
    ).toThrow('Frame 3 has 5 bytes, expected 6 for rgb24 2x1');
  });
});
