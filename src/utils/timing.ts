/**
 * Cancellable waits built on rxjs.
 */

import {
  firstValueFrom,
  from,
  NEVER,
  Observable,
  race,
  timer,
} from 'rxjs';
import { map } from 'rxjs/operators';

/**
 * Emits once when the signal aborts (immediately if it already has)
 */
export function fromAbortSignal(signal?: AbortSignal): Observable<void> {
  if (!signal) return NEVER;

  return new Observable<void>((subscriber) => {
    if (signal.aborted) {
      subscriber.next();
      subscriber.complete();
      return;
    }
    const onAbort = () => {
      subscriber.next();
      subscriber.complete();
    };
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
  });
}

/**
 * Wait up to `ms`, returning early when `interrupt$` emits.
 *
 * @returns true if the full delay elapsed, false if interrupted
 */
export function interruptibleDelay(
  ms: number,
  interrupt$: Observable<unknown> = NEVER
): Promise<boolean> {
  return firstValueFrom(
    race(
      timer(Math.max(0, ms)).pipe(map(() => true)),
      interrupt$.pipe(map(() => false))
    ),
    { defaultValue: false }
  );
}

/**
 * Wait up to `ms` unless the signal aborts first
 */
export function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
  return interruptibleDelay(ms, fromAbortSignal(signal));
}

/**
 * Resolve with 'settled' once the promise settles, or 'timeout' after `ms`.
 * The promise itself keeps running.
 */
export function settleWithin(
  promise: Promise<unknown>,
  ms: number
): Promise<'settled' | 'timeout'> {
  const settled = promise.then(
    () => 'settled' as const,
    () => 'settled' as const
  );
  return firstValueFrom(
    race(timer(ms).pipe(map(() => 'timeout' as const)), from(settled))
  );
}
