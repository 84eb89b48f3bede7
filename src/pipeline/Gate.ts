/**
 * Gate - binary open/closed wait primitive
 *
 * The decode loop waits on the gate while paused and sleeps through it
 * between frames, so closing the gate takes effect within one sleep
 * interval instead of after it.
 */

import { BehaviorSubject, firstValueFrom, merge, race } from 'rxjs';
import { filter, map } from 'rxjs/operators';
import { fromAbortSignal, interruptibleDelay } from '../utils/timing';

export class Gate {
  private readonly openSubject: BehaviorSubject<boolean>;

  constructor(initiallyOpen = true) {
    this.openSubject = new BehaviorSubject<boolean>(initiallyOpen);
  }

  get isOpen(): boolean {
    return this.openSubject.getValue();
  }

  open(): void {
    if (!this.isOpen) this.openSubject.next(true);
  }

  close(): void {
    if (this.isOpen) this.openSubject.next(false);
  }

  /**
   * Resolves once the gate is open or the signal aborts
   */
  async waitUntilOpen(signal?: AbortSignal): Promise<void> {
    await firstValueFrom(
      race(
        this.openSubject.pipe(filter((open) => open)),
        fromAbortSignal(signal)
      ),
      { defaultValue: undefined }
    );
  }

  /**
   * Sleep up to `ms`; wakes early when the gate closes or the signal aborts.
   *
   * @returns true if the full interval elapsed
   */
  sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    const closed$ = this.openSubject.pipe(
      filter((open) => !open),
      map(() => undefined)
    );
    return interruptibleDelay(ms, merge(closed$, fromAbortSignal(signal)));
  }

  dispose(): void {
    this.openSubject.complete();
  }
}
