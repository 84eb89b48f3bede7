/**
 * PlaybackEngine - decodes a media source at its native pace
 *
 * State machine:
 *   idle --play()--> playing --pause()--> paused --resume()--> playing
 *   playing|paused --stop()--> idle
 *
 * The decode loop publishes every frame three ways: a private copy into the
 * CurrentFrameSlot (read by the FrameSampler), a progress event and an
 * rgb24 display frame. Pausing closes a gate; the source stays open, so
 * resuming continues with the next frame.
 */

import { BehaviorSubject, type Observable, Subject } from 'rxjs';
import type {
  DisplayFrame,
  Frame,
  MediaProperties,
  PlaybackProgress,
  PlaybackState,
  ReadResult,
  SourceIdentifier,
  StatusMessage,
} from '../types/media';
import { createLogger } from '../utils/logger';
import { toDisplayFrame } from '../utils/pixelFormat';
import { settleWithin } from '../utils/timing';
import { CurrentFrameSlot } from './CurrentFrameSlot';
import {
  DecodeReadError,
  describeError,
  describeSource,
  PipelineError,
  ResourceReleaseTimeout,
  SourceOpenError,
} from './errors';
import { Gate } from './Gate';
import {
  clampFrameIndex,
  type MediaSource,
  type MediaSourceOpener,
} from './MediaSource';
import {
  createMediaSourceOpener,
  parseSourceIdentifier,
} from './MediaSourceFactory';

const log = createLogger({ component: 'PlaybackEngine' });

export interface PlaybackEngineOptions {
  openSource: MediaSourceOpener;
  /** Rewind finite sources at end of stream instead of finishing */
  loopAtEnd: boolean;
  /** How long stop() waits for the decode loop before releasing anyway */
  joinTimeoutMs: number;
  /** Pause after a failed read before trying again */
  readRetryDelayMs: number;
  /** Monotonic clock in milliseconds */
  now: () => number;
}

export const DEFAULT_PLAYBACK_OPTIONS: PlaybackEngineOptions = {
  openSource: createMediaSourceOpener(),
  loopAtEnd: true,
  joinTimeoutMs: 1000,
  readRetryDelayMs: 20,
  now: () => performance.now(),
};

/**
 * Everything owned by one play() call
 */
interface PlaybackRun {
  readonly identifier: SourceIdentifier;
  readonly source: MediaSource;
  readonly properties: MediaProperties;
  readonly gate: Gate;
  readonly abort: AbortController;
  /** Tail of the source access chain; seek and decode steps queue on it */
  access: Promise<void>;
  loop: Promise<void>;
  /** Frames published since the run started or last rewound */
  framesSinceRewind: number;
}

type StepOutcome = 'frame' | 'rewound' | 'failed' | 'ended';

export class PlaybackEngine {
  private readonly options: PlaybackEngineOptions;
  private readonly slot = new CurrentFrameSlot();

  private readonly stateSubject = new BehaviorSubject<PlaybackState>('idle');
  private readonly frameReadySubject = new Subject<DisplayFrame>();
  private readonly progressSubject = new Subject<PlaybackProgress>();
  private readonly statusSubject = new Subject<StatusMessage>();
  private readonly errorSubject = new Subject<PipelineError>();
  private readonly finishedSubject = new Subject<void>();

  private run: PlaybackRun | null = null;
  private stopping: Promise<void> = Promise.resolve();

  constructor(options: Partial<PlaybackEngineOptions> = {}) {
    this.options = { ...DEFAULT_PLAYBACK_OPTIONS, ...options };
  }

  get state(): PlaybackState {
    return this.stateSubject.getValue();
  }

  get state$(): Observable<PlaybackState> {
    return this.stateSubject.asObservable();
  }

  /**
   * rgb24 copy of every decoded frame
   */
  get frameReady$(): Observable<DisplayFrame> {
    return this.frameReadySubject.asObservable();
  }

  get progress$(): Observable<PlaybackProgress> {
    return this.progressSubject.asObservable();
  }

  get status$(): Observable<StatusMessage> {
    return this.statusSubject.asObservable();
  }

  get error$(): Observable<PipelineError> {
    return this.errorSubject.asObservable();
  }

  /**
   * Emits when a run ends, whether stopped or finished on its own
   */
  get finished$(): Observable<void> {
    return this.finishedSubject.asObservable();
  }

  /**
   * Open a source and start decoding. Stops the current run first.
   * Resolves once the loop is running; an unopenable source is reported on
   * error$ and leaves the engine idle.
   */
  async play(target: SourceIdentifier | string): Promise<void> {
    const identifier =
      typeof target === 'string' ? parseSourceIdentifier(target) : target;

    await this.stop();

    let source: MediaSource;
    try {
      source = await this.options.openSource(identifier);
    } catch (error) {
      this.reportError(
        error instanceof PipelineError
          ? error
          : new SourceOpenError(identifier, describeError(error), { cause: error })
      );
      return;
    }

    // A second play() may have started while this one was opening
    await this.stop();

    const run: PlaybackRun = {
      identifier,
      source,
      properties: source.properties(),
      gate: new Gate(true),
      abort: new AbortController(),
      access: Promise.resolve(),
      loop: Promise.resolve(),
      framesSinceRewind: 0,
    };
    this.run = run;
    this.slot.clear();
    this.setState('playing');

    const { frameRate, totalFrameCount } = run.properties;
    this.emitStatus(
      'info',
      `Playing ${describeSource(identifier)} (${frameRate.toFixed(2)} fps, ${totalFrameCount} frames)`
    );
    run.loop = this.decodeLoop(run);
  }

  playCamera(deviceIndex: number): Promise<void> {
    return this.play({ kind: 'camera', deviceIndex });
  }

  pause(): void {
    if (!this.run || this.state !== 'playing') return;
    this.run.gate.close();
    this.setState('paused');
    this.emitStatus('info', 'Paused');
  }

  resume(): void {
    if (!this.run || this.state !== 'paused') return;
    this.run.gate.open();
    this.setState('playing');
    this.emitStatus('info', 'Playing');
  }

  /**
   * End the current run: abort the loop, wait for it (bounded), release the
   * source and clear the slot. Idempotent.
   */
  stop(): Promise<void> {
    const run = this.run;
    if (!run) return this.stopping;

    this.run = null;
    this.stopping = this.teardown(run, true);
    return this.stopping;
  }

  /**
   * Jump to `frameIndex` and publish that frame at once, also while paused.
   * Ignored for live sources.
   */
  async seek(frameIndex: number): Promise<void> {
    const run = this.run;
    if (!run) {
      log.debug('Seek ignored: no source is playing', { action: 'seek' });
      return;
    }
    if (run.source.isLive) {
      log.debug('Seek ignored: live source', { action: 'seek' });
      return;
    }

    const target = clampFrameIndex(frameIndex, run.properties.totalFrameCount);
    await this.exclusive(run, async () => {
      if (run.abort.signal.aborted) return;
      try {
        await run.source.seek(target);
        const result = await run.source.readNext();
        if (run.abort.signal.aborted) return;
        if (result.type === 'frame') {
          this.publish(run, result.frame);
        }
      } catch (error) {
        if (run.abort.signal.aborted) return;
        this.emitStatus(
          'warning',
          `Seek to frame ${target} failed: ${describeError(error)}`
        );
      }
    });
  }

  /**
   * Copy of the most recently decoded frame
   */
  getCurrentFrame(): Frame | null {
    return this.slot.read();
  }

  getProperties(): MediaProperties | null {
    return this.run ? { ...this.run.properties } : null;
  }

  /**
   * Whether the current source is a live device
   */
  isLive(): boolean {
    return this.run?.source.isLive ?? false;
  }

  async dispose(): Promise<void> {
    await this.stop();
    this.stateSubject.complete();
    this.frameReadySubject.complete();
    this.progressSubject.complete();
    this.statusSubject.complete();
    this.errorSubject.complete();
    this.finishedSubject.complete();
  }

  private async decodeLoop(run: PlaybackRun): Promise<void> {
    const { signal } = run.abort;
    const frameIntervalMs = 1000 / run.properties.frameRate;

    try {
      while (!signal.aborted) {
        if (!run.gate.isOpen) {
          await run.gate.waitUntilOpen(signal);
          continue;
        }

        const startedAt = this.options.now();
        const outcome = await this.exclusive(run, () => this.step(run));
        if (signal.aborted || outcome === 'ended') break;

        if (outcome === 'failed') {
          await run.gate.sleep(this.options.readRetryDelayMs, signal);
        } else if (outcome === 'frame') {
          const elapsed = this.options.now() - startedAt;
          await run.gate.sleep(Math.max(0, frameIntervalMs - elapsed), signal);
        }
      }
    } catch (error) {
      this.reportError(
        new DecodeReadError(`Decode loop failed: ${describeError(error)}`, {
          cause: error,
        })
      );
    }

    // The run ended by itself rather than through stop()
    if (this.run === run) {
      this.run = null;
      this.stopping = this.teardown(run, false);
      await this.stopping;
    }
  }

  private async step(run: PlaybackRun): Promise<StepOutcome> {
    if (run.abort.signal.aborted) return 'ended';

    let result: ReadResult;
    try {
      result = await run.source.readNext();
    } catch (error) {
      if (!run.abort.signal.aborted) {
        this.emitStatus('warning', `Read failed: ${describeError(error)}`);
      }
      return 'failed';
    }

    if (run.abort.signal.aborted) return 'ended';

    if (result.type === 'frame') {
      this.publish(run, result.frame);
      return 'frame';
    }
    return this.handleEndOfStream(run);
  }

  private async handleEndOfStream(run: PlaybackRun): Promise<StepOutcome> {
    if (run.source.isLive) {
      this.emitStatus('info', 'Stream ended');
      return 'ended';
    }
    if (run.framesSinceRewind === 0) {
      this.reportError(
        new DecodeReadError(
          `No decodable frames in ${describeSource(run.identifier)}`
        )
      );
      return 'ended';
    }
    if (!this.options.loopAtEnd) {
      this.emitStatus('info', 'Reached end of media');
      return 'ended';
    }

    log.debug('End of stream, rewinding', { action: 'loop' });
    await run.source.seek(0);
    run.framesSinceRewind = 0;
    return 'rewound';
  }

  private publish(run: PlaybackRun, frame: Frame): void {
    this.slot.write(frame);
    run.framesSinceRewind++;

    const { totalFrameCount, frameRate } = run.properties;
    this.progressSubject.next({
      currentIndex: frame.index,
      totalFrames: totalFrameCount,
      currentTime: frame.index / frameRate,
    });

    let display: DisplayFrame;
    try {
      display = toDisplayFrame(frame);
    } catch (error) {
      this.emitStatus('warning', `Cannot display frame: ${describeError(error)}`);
      return;
    }
    this.frameReadySubject.next(display);
  }

  /**
   * Run `task` once every earlier source access has settled
   */
  private exclusive<T>(run: PlaybackRun, task: () => Promise<T>): Promise<T> {
    const result = run.access.then(task);
    run.access = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async teardown(run: PlaybackRun, joinLoop: boolean): Promise<void> {
    run.abort.abort();

    // A seek may still be reading after the loop has exited
    const pending = joinLoop ? Promise.all([run.loop, run.access]) : run.access;
    const outcome = await settleWithin(pending, this.options.joinTimeoutMs);
    if (outcome === 'timeout') {
      const warning = new ResourceReleaseTimeout(
        'Decode loop',
        this.options.joinTimeoutMs
      );
      this.emitStatus('warning', warning.message);
    }

    try {
      await run.source.close();
    } catch (error) {
      this.emitStatus('warning', `Failed to close source: ${describeError(error)}`);
    }

    run.gate.dispose();
    this.slot.clear();
    this.setState('idle');
    log.debug(`Released ${describeSource(run.identifier)}`, { action: 'stop' });
    this.finishedSubject.next();
  }

  private setState(state: PlaybackState): void {
    if (this.state !== state) {
      this.stateSubject.next(state);
    }
  }

  private emitStatus(level: StatusMessage['level'], message: string): void {
    if (level === 'warning') {
      log.warn(message);
    } else {
      log.info(message);
    }
    this.statusSubject.next({ level, message });
  }

  private reportError(error: PipelineError): void {
    log.error(error.message, error);
    this.errorSubject.next(error);
  }
}
