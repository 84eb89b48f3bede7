/**
 * MediaSourceFactory - picks a MediaSource implementation for an identifier
 */

import { extname } from 'node:path';
import type { SourceIdentifier } from '../types/media';
import { type CameraOptions, CameraMediaSource } from './CameraMediaSource';
import { SourceOpenError } from './errors';
import type { MediaSource, MediaSourceOpener } from './MediaSource';
import { StillImageMediaSource } from './StillImageMediaSource';
import { VideoFileMediaSource } from './VideoFileMediaSource';

export const VIDEO_EXTENSIONS = ['.y4m'];
export const IMAGE_EXTENSIONS = ['.pgm', '.ppm', '.pnm'];

const CAMERA_PATTERN = /^camera:(\d+)$/;

/**
 * `camera:N` selects device N; anything else is a file path
 */
export function parseSourceIdentifier(value: string): SourceIdentifier {
  const match = CAMERA_PATTERN.exec(value.trim());
  if (match) {
    return { kind: 'camera', deviceIndex: Number.parseInt(match[1], 10) };
  }
  return { kind: 'file', path: value };
}

export function isStillImagePath(path: string): boolean {
  return IMAGE_EXTENSIONS.includes(extname(path).toLowerCase());
}

export async function openMediaSource(
  identifier: SourceIdentifier,
  cameraOptions: Partial<CameraOptions> = {}
): Promise<MediaSource> {
  if (identifier.kind === 'camera') {
    return CameraMediaSource.open(identifier.deviceIndex, cameraOptions);
  }

  const extension = extname(identifier.path).toLowerCase();
  if (VIDEO_EXTENSIONS.includes(extension)) {
    return VideoFileMediaSource.open(identifier.path);
  }
  if (IMAGE_EXTENSIONS.includes(extension)) {
    return StillImageMediaSource.open(identifier.path);
  }
  throw new SourceOpenError(
    identifier,
    `Unsupported file type "${extension || '(none)'}"`
  );
}

/**
 * Opener bound to fixed camera settings, for injection into the engine
 */
export function createMediaSourceOpener(
  cameraOptions: Partial<CameraOptions> = {}
): MediaSourceOpener {
  return (identifier) => openMediaSource(identifier, cameraOptions);
}
