/**
 * In-process stand-in for the ffmpeg capture process.
 *
 * Tests write Y4M bytes into `stdout` and decide when the "process" exits.
 */

import { PassThrough } from 'node:stream';
import { type Mock, vi } from 'vitest';
import type { CaptureHandle, SpawnCapture } from '../pipeline/CameraMediaSource';

export interface FakeCapture {
  handle: CaptureHandle;
  stdout: PassThrough;
  stop: Mock<() => void>;
  /** End the stream and resolve `exited` with `code` */
  exit(code: number | null): void;
}

export function createFakeCapture(): FakeCapture {
  const stdout = new PassThrough();
  let resolveExit: (code: number | null) => void = () => {};
  const exited = new Promise<number | null>((resolve) => {
    resolveExit = resolve;
  });

  const stop = vi.fn<() => void>(() => {
    resolveExit(null);
  });

  return {
    handle: { stdout, stop, exited },
    stdout,
    stop,
    exit: (code) => {
      stdout.end();
      resolveExit(code);
    },
  };
}

/**
 * A spawn function that always hands out `capture`, recording its arguments
 */
export function spawnReturning(capture: FakeCapture) {
  return vi.fn<SpawnCapture>(() => capture.handle);
}
