/**
 * CurrentFrameSlot - latest-wins single-frame cell
 *
 * Written by the decode loop, read by the sampling loop and by callers that
 * want a snapshot. Every write stores a copy and every read returns a copy,
 * so no reference to the stored buffer leaves the slot. Both operations are
 * synchronous; no other task can run between the copy and the store.
 */

import type { Frame } from '../types/media';
import { copyFrame } from '../utils/pixelFormat';

export class CurrentFrameSlot {
  private frame: Frame | null = null;

  /**
   * Replace the current frame with a private copy of `frame`
   */
  write(frame: Frame): void {
    this.frame = copyFrame(frame);
  }

  /**
   * Copy of the current frame, or null before the first write
   */
  read(): Frame | null {
    return this.frame ? copyFrame(this.frame) : null;
  }

  clear(): void {
    this.frame = null;
  }
}
