/**
 * SyntheticMediaSource
 *
 * Deterministic in-memory source for tests and demos. Every sample of frame
 * `i` holds the same byte, (i * 7 + 1) % 256, so any frame seen downstream
 * can be traced to the decode step that produced it and a torn frame shows
 * up as mixed bytes.
 */

import { DecodeReadError, SourceOpenError } from '../pipeline/errors';
import {
  clampFrameIndex,
  type MediaSource,
  type MediaSourceOpener,
  resolveProperties,
} from '../pipeline/MediaSource';
import type {
  Frame,
  MediaProperties,
  PixelFormat,
  ReadResult,
  SourceIdentifier,
} from '../types/media';
import { frameByteLength } from '../utils/pixelFormat';
import { delay } from '../utils/timing';

export interface SyntheticSourceOptions {
  frameCount?: number;
  frameRate?: number;
  width?: number;
  height?: number;
  format?: PixelFormat;
  /** Behave like a camera: no wrap, seeks ignored */
  live?: boolean;
  /** Report no frame rate or count, as some containers do */
  unknownProperties?: boolean;
  /**
   * Decode every frame into one shared buffer, as hardware decoders do.
   * Anything holding a reference instead of a copy sees it change.
   */
  reuseBuffer?: boolean;
  /** Frame indices whose first read attempt fails */
  failingReads?: number[];
  /** Simulated decode time per read */
  readDelayMs?: number;
}

export function syntheticFillByte(index: number): number {
  return (index * 7 + 1) % 256;
}

export class SyntheticMediaSource implements MediaSource {
  readonly type = 'synthetic' as const;
  readonly isLive: boolean;

  /** Successful reads so far */
  readCount = 0;
  readonly seeks: number[] = [];
  closeCount = 0;

  private position = 0;
  private closed = false;
  private readonly pendingFailures: Set<number>;
  private readonly sharedBuffer: Uint8Array | null;
  private readonly frameCount: number;
  private readonly frameRate: number;
  private readonly width: number;
  private readonly height: number;
  private readonly format: PixelFormat;

  constructor(private readonly options: SyntheticSourceOptions = {}) {
    this.frameCount = options.frameCount ?? 100;
    this.frameRate = options.frameRate ?? 25;
    this.width = options.width ?? 4;
    this.height = options.height ?? 2;
    this.format = options.format ?? 'gray8';
    this.isLive = options.live ?? false;
    this.pendingFailures = new Set(options.failingReads ?? []);
    this.sharedBuffer = options.reuseBuffer
      ? new Uint8Array(frameByteLength(this.format, this.width, this.height))
      : null;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  properties(): MediaProperties {
    const unknown = this.options.unknownProperties ?? false;
    return resolveProperties({
      frameRate: unknown ? null : this.frameRate,
      totalFrameCount: unknown || this.isLive ? null : this.frameCount,
      width: this.width,
      height: this.height,
    });
  }

  async readNext(): Promise<ReadResult> {
    if (this.options.readDelayMs) {
      await delay(this.options.readDelayMs);
    }
    if (this.closed) {
      throw new DecodeReadError('Source is closed');
    }
    if (this.position >= this.frameCount) {
      return { type: 'end-of-stream' };
    }

    const index = this.position;
    if (this.pendingFailures.delete(index)) {
      throw new DecodeReadError(`Synthetic read failure at frame ${index}`);
    }

    const size = frameByteLength(this.format, this.width, this.height);
    const data = this.sharedBuffer ?? new Uint8Array(size);
    data.fill(syntheticFillByte(index));

    this.position = index + 1;
    this.readCount++;

    const frame: Frame = {
      index,
      timestamp: index / this.frameRate,
      width: this.width,
      height: this.height,
      format: this.format,
      data,
    };
    return { type: 'frame', frame };
  }

  async seek(frameIndex: number): Promise<void> {
    this.seeks.push(frameIndex);
    if (this.isLive) return;
    this.position = clampFrameIndex(frameIndex, this.frameCount);
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.closed = true;
  }
}

/**
 * Opener that builds a fresh synthetic source for every open, keeping each
 * one so tests can inspect it. Identifiers matching `unopenable` fail to open.
 */
export function createSyntheticOpener(
  options: SyntheticSourceOptions = {},
  unopenable: (identifier: SourceIdentifier) => boolean = () => false
): { open: MediaSourceOpener; opened: SyntheticMediaSource[] } {
  const opened: SyntheticMediaSource[] = [];

  const open: MediaSourceOpener = async (identifier) => {
    if (unopenable(identifier)) {
      throw new SourceOpenError(identifier, 'No such source');
    }
    const source = new SyntheticMediaSource({
      ...options,
      live: options.live ?? identifier.kind === 'camera',
    });
    opened.push(source);
    return source;
  };

  return { open, opened };
}
