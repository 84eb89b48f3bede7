/**
 * Media Types
 *
 * Shared types for decoded frames, media sources and playback state.
 */

/**
 * Pixel layouts a source can decode into.
 * Planar YUV formats store the full Y plane followed by U and V planes.
 */
export type PixelFormat = 'rgb24' | 'bgr24' | 'gray8' | 'yuv420p' | 'yuv444p';

/** Luma/chroma range of YUV samples */
export type ColorRange = 'full' | 'limited';

/**
 * A decoded frame.
 *
 * Frames are snapshots: whoever hands a frame to another component hands over
 * a copy, so the receiver never sees the decoder reuse the buffer.
 */
export interface Frame {
  /** Zero-based frame index within the source */
  readonly index: number;
  /** Source timestamp in seconds */
  readonly timestamp: number;
  readonly width: number;
  readonly height: number;
  readonly format: PixelFormat;
  /** Only meaningful for YUV formats; full range when omitted */
  readonly colorRange?: ColorRange;
  readonly data: Uint8Array;
}

/**
 * A frame converted to packed RGB for rendering
 */
export interface DisplayFrame extends Frame {
  readonly format: 'rgb24';
}

/**
 * Static properties reported by a media source
 */
export interface MediaProperties {
  frameRate: number;
  totalFrameCount: number;
  /** Seconds; 0 when the frame count is unknown */
  duration: number;
  width: number;
  height: number;
}

/**
 * Where to read media from
 */
export type SourceIdentifier =
  | { kind: 'file'; path: string }
  | { kind: 'camera'; deviceIndex: number };

/**
 * Outcome of a single read step
 */
export type ReadResult =
  | { type: 'frame'; frame: Frame }
  | { type: 'end-of-stream' };

/**
 * Playback state owned by the PlaybackEngine
 */
export type PlaybackState = 'idle' | 'playing' | 'paused';

/**
 * Progress emitted on every decode tick
 */
export interface PlaybackProgress {
  currentIndex: number;
  totalFrames: number;
  /** Seconds */
  currentTime: number;
}

/**
 * Human-readable progress or warning line shown in a status bar
 */
export interface StatusMessage {
  level: 'info' | 'warning';
  message: string;
}
