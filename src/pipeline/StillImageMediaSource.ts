/**
 * StillImageMediaSource - a PNM image exposed as a one-frame source
 */

import { readFile } from 'node:fs/promises';
import type { Frame, MediaProperties, ReadResult } from '../types/media';
import { copyFrame } from '../utils/pixelFormat';
import { decodePnm } from '../utils/pnm';
import { DecodeReadError, describeError, SourceOpenError } from './errors';
import { type MediaSource, resolveProperties } from './MediaSource';

/**
 * Decode a still image into frame 0
 */
export async function loadStillImage(path: string): Promise<Frame> {
  try {
    const image = decodePnm(await readFile(path));
    return {
      index: 0,
      timestamp: 0,
      width: image.width,
      height: image.height,
      format: image.format,
      data: image.data,
    };
  } catch (error) {
    throw new SourceOpenError({ kind: 'file', path }, describeError(error), {
      cause: error,
    });
  }
}

export class StillImageMediaSource implements MediaSource {
  readonly type = 'still-image' as const;
  readonly isLive = false;

  private consumed = false;
  private closed = false;

  private constructor(private readonly frame: Frame) {}

  static async open(path: string): Promise<StillImageMediaSource> {
    return new StillImageMediaSource(await loadStillImage(path));
  }

  properties(): MediaProperties {
    return resolveProperties({
      frameRate: null,
      totalFrameCount: 1,
      width: this.frame.width,
      height: this.frame.height,
    });
  }

  async readNext(): Promise<ReadResult> {
    if (this.closed) {
      throw new DecodeReadError('Source is closed');
    }
    if (this.consumed) {
      return { type: 'end-of-stream' };
    }
    this.consumed = true;
    return { type: 'frame', frame: copyFrame(this.frame) };
  }

  async seek(_frameIndex: number): Promise<void> {
    // Every index clamps to the only frame
    this.consumed = false;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
