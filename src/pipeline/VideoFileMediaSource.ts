/**
 * VideoFileMediaSource - indexed Y4M file on disk
 *
 * The file is scanned once at open time to record where every frame
 * payload starts, which makes seeking a constant-time cursor move.
 * A truncated final frame is left out of the index.
 */

import { type FileHandle, open } from 'node:fs/promises';
import type { Frame, MediaProperties, ReadResult } from '../types/media';
import { createLogger } from '../utils/logger';
import {
  MAX_Y4M_LINE_LENGTH,
  parseY4mHeader,
  Y4M_FRAME_MARKER,
  type Y4mHeader,
  y4mFrameSize,
} from '../utils/y4m';
import { DecodeReadError, describeError, SourceOpenError } from './errors';
import {
  clampFrameIndex,
  type MediaSource,
  resolveProperties,
} from './MediaSource';

const log = createLogger({ component: 'VideoFileMediaSource' });

const NEWLINE = 0x0a;

async function readHeader(
  handle: FileHandle
): Promise<{ header: Y4mHeader; dataOffset: number }> {
  const buffer = Buffer.alloc(MAX_Y4M_LINE_LENGTH);
  const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
  const newline = buffer.subarray(0, bytesRead).indexOf(NEWLINE);
  if (newline < 0) {
    throw new Error('Missing Y4M header line');
  }
  return {
    header: parseY4mHeader(buffer.toString('ascii', 0, newline)),
    dataOffset: newline + 1,
  };
}

/**
 * Offsets of every complete frame payload
 */
async function indexFrames(
  handle: FileHandle,
  dataOffset: number,
  frameSize: number,
  fileSize: number
): Promise<number[]> {
  const offsets: number[] = [];
  const lineBuffer = Buffer.alloc(MAX_Y4M_LINE_LENGTH);
  let offset = dataOffset;

  while (offset < fileSize) {
    const length = Math.min(lineBuffer.length, fileSize - offset);
    const { bytesRead } = await handle.read(lineBuffer, 0, length, offset);
    const newline = lineBuffer.subarray(0, bytesRead).indexOf(NEWLINE);
    if (
      newline < 0 ||
      !lineBuffer.toString('ascii', 0, newline).startsWith(Y4M_FRAME_MARKER)
    ) {
      log.warn(`Stopped indexing at byte ${offset}: no FRAME marker`);
      break;
    }

    const payloadOffset = offset + newline + 1;
    if (payloadOffset + frameSize > fileSize) {
      log.warn(`Ignoring truncated frame at byte ${offset}`);
      break;
    }

    offsets.push(payloadOffset);
    offset = payloadOffset + frameSize;
  }

  return offsets;
}

export class VideoFileMediaSource implements MediaSource {
  readonly type = 'video-file' as const;
  readonly isLive = false;

  private position = 0;
  private closed = false;
  private readonly frameSize: number;
  private readonly props: MediaProperties;

  private constructor(
    private readonly handle: FileHandle,
    private readonly header: Y4mHeader,
    private readonly frameOffsets: number[]
  ) {
    this.frameSize = y4mFrameSize(header);
    this.props = resolveProperties({
      frameRate: header.frameRate,
      totalFrameCount: frameOffsets.length,
      width: header.width,
      height: header.height,
    });
  }

  /**
   * Open and index a Y4M file
   */
  static async open(path: string): Promise<VideoFileMediaSource> {
    const identifier = { kind: 'file', path } as const;

    let handle: FileHandle;
    try {
      handle = await open(path, 'r');
    } catch (error) {
      throw new SourceOpenError(identifier, describeError(error), {
        cause: error,
      });
    }

    try {
      const { size } = await handle.stat();
      const { header, dataOffset } = await readHeader(handle);
      const offsets = await indexFrames(
        handle,
        dataOffset,
        y4mFrameSize(header),
        size
      );
      if (offsets.length === 0) {
        throw new Error('File contains no complete frames');
      }

      log.debug(
        `Indexed ${offsets.length} frames (${header.width}x${header.height} ${header.format})`,
        { action: 'open' }
      );
      return new VideoFileMediaSource(handle, header, offsets);
    } catch (error) {
      await handle.close();
      throw new SourceOpenError(identifier, describeError(error), {
        cause: error,
      });
    }
  }

  properties(): MediaProperties {
    return { ...this.props };
  }

  /**
   * Read the frame at the cursor. A failed read still advances the cursor,
   * so the next attempt moves past an unreadable frame.
   */
  async readNext(): Promise<ReadResult> {
    if (this.closed) {
      throw new DecodeReadError('Source is closed');
    }
    if (this.position >= this.frameOffsets.length) {
      return { type: 'end-of-stream' };
    }

    const index = this.position;
    this.position = index + 1;

    const data = Buffer.alloc(this.frameSize);
    let bytesRead: number;
    try {
      ({ bytesRead } = await this.handle.read(
        data,
        0,
        this.frameSize,
        this.frameOffsets[index]
      ));
    } catch (error) {
      throw new DecodeReadError(
        `Failed to read frame ${index}: ${describeError(error)}`,
        { cause: error }
      );
    }
    if (bytesRead < this.frameSize) {
      throw new DecodeReadError(
        `Short read on frame ${index}: ${bytesRead} of ${this.frameSize} bytes`
      );
    }

    const frame: Frame = {
      index,
      timestamp: index / this.props.frameRate,
      width: this.header.width,
      height: this.header.height,
      format: this.header.format,
      colorRange: this.header.colorRange,
      data,
    };
    return { type: 'frame', frame };
  }

  async seek(frameIndex: number): Promise<void> {
    this.position = clampFrameIndex(frameIndex, this.frameOffsets.length);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
