/**
 * MediaSource - Unified interface for decodable media
 *
 * File, still-image, camera and synthetic sources implement this interface,
 * so the PlaybackEngine can drive any of them without knowing the details.
 */

import type {
  MediaProperties,
  ReadResult,
  SourceIdentifier,
} from '../types/media';

/**
 * Source type discriminator
 */
export type MediaSourceType = 'video-file' | 'still-image' | 'camera' | 'synthetic';

/** Frame rate reported when a source cannot tell */
export const DEFAULT_FRAME_RATE = 30;

/** Frame count reported when a source cannot tell */
export const FALLBACK_TOTAL_FRAMES = 1000;

export interface MediaSource {
  /** Source type discriminator */
  readonly type: MediaSourceType;

  /**
   * Live sources never wrap at end of stream and ignore seeks
   */
  readonly isLive: boolean;

  /**
   * Decode the next frame.
   * Rejects with DecodeReadError when a read fails; the source stays usable.
   */
  readNext(): Promise<ReadResult>;

  /**
   * Reposition the read cursor, clamped to [0, totalFrameCount)
   */
  seek(frameIndex: number): Promise<void>;

  properties(): MediaProperties;

  /**
   * Release the file or device. Idempotent, and safe while a read is pending.
   */
  close(): Promise<void>;
}

/**
 * Opens a source, rejecting with SourceOpenError
 */
export type MediaSourceOpener = (
  identifier: SourceIdentifier
) => Promise<MediaSource>;

/**
 * Build reported properties, substituting defaults for what a source
 * could not determine.
 */
export function resolveProperties(reported: {
  frameRate: number | null;
  totalFrameCount: number | null;
  width: number;
  height: number;
}): MediaProperties {
  const frameRate =
    reported.frameRate !== null && reported.frameRate > 0
      ? reported.frameRate
      : DEFAULT_FRAME_RATE;
  const count = reported.totalFrameCount;
  const known = count !== null && count > 0;

  return {
    frameRate,
    totalFrameCount: known ? count : FALLBACK_TOTAL_FRAMES,
    duration: known ? count / frameRate : 0,
    width: reported.width,
    height: reported.height,
  };
}

/**
 * Clamp a requested index into a source's frame range
 */
export function clampFrameIndex(frameIndex: number, totalFrames: number): number {
  if (!Number.isFinite(frameIndex) || totalFrames <= 0) return 0;
  return Math.min(Math.max(0, Math.floor(frameIndex)), totalFrames - 1);
}
