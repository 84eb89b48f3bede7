/**
 * FrameSampler - runs inference on the latest frame, decoupled from playback
 *
 * The sampling loop polls the current frame, counts every observation and
 * hands every Nth one to the inference collaborator. A slow model only slows
 * this loop; the decode loop keeps its own pace and the sampler simply
 * picks up whatever frame is newest when it comes back.
 */

import { type Observable, Subject } from 'rxjs';
import type { DisplayFrame, Frame, StatusMessage } from '../types/media';
import { createLogger } from '../utils/logger';
import { toDisplayFrame } from '../utils/pixelFormat';
import { delay, settleWithin } from '../utils/timing';
import {
  describeError,
  InferenceCallError,
  type PipelineError,
  ResourceReleaseTimeout,
} from './errors';
import {
  type InferenceCollaborator,
  type InferenceResult,
  validateInferenceResult,
} from './InferenceCollaborator';
import {
  type InferenceStatistics,
  StatisticsAggregator,
} from './StatisticsAggregator';

const log = createLogger({ component: 'FrameSampler' });

/**
 * Anything that can hand out a copy of the newest frame
 */
export interface FrameProvider {
  getCurrentFrame(): Frame | null;
}

export interface FrameSamplerOptions {
  /** Wait before polling again when no frame has been decoded yet */
  emptySlotDelayMs: number;
  /** Wait between observations */
  pollDelayMs: number;
  /** How long stopSampling() waits for the loop before giving up */
  joinTimeoutMs: number;
  /** Monotonic clock in milliseconds */
  now: () => number;
}

export const DEFAULT_SAMPLER_OPTIONS: FrameSamplerOptions = {
  emptySlotDelayMs: 100,
  pollDelayMs: 50,
  joinTimeoutMs: 1000,
  now: () => performance.now(),
};

export interface ProcessedFrame {
  /** Index of the frame that was sampled */
  sourceIndex: number;
  /** Annotated frame (or the sampled frame) in rgb24 */
  frame: DisplayFrame;
  result: InferenceResult;
}

interface SamplingSession {
  readonly interval: number;
  readonly abort: AbortController;
  loop: Promise<void>;
}

export class FrameSampler {
  private readonly options: FrameSamplerOptions;
  private readonly aggregator: StatisticsAggregator;

  private readonly processedFrameSubject = new Subject<ProcessedFrame>();
  private readonly statisticsSubject = new Subject<InferenceStatistics>();
  private readonly statusSubject = new Subject<StatusMessage>();
  private readonly errorSubject = new Subject<PipelineError>();
  private readonly finishedSubject = new Subject<void>();

  private collaborator: InferenceCollaborator | null = null;
  private session: SamplingSession | null = null;
  private stopping: Promise<void> = Promise.resolve();

  constructor(
    private readonly frames: FrameProvider,
    options: Partial<FrameSamplerOptions> = {}
  ) {
    this.options = { ...DEFAULT_SAMPLER_OPTIONS, ...options };
    this.aggregator = new StatisticsAggregator(this.options.now());
  }

  get processedFrame$(): Observable<ProcessedFrame> {
    return this.processedFrameSubject.asObservable();
  }

  /**
   * Emits after every completed inference
   */
  get statistics$(): Observable<InferenceStatistics> {
    return this.statisticsSubject.asObservable();
  }

  get status$(): Observable<StatusMessage> {
    return this.statusSubject.asObservable();
  }

  get error$(): Observable<PipelineError> {
    return this.errorSubject.asObservable();
  }

  /**
   * Emits once per session, when it stops
   */
  get finished$(): Observable<void> {
    return this.finishedSubject.asObservable();
  }

  get isRunning(): boolean {
    return this.session !== null;
  }

  setInferenceCollaborator(collaborator: InferenceCollaborator | null): void {
    this.collaborator = collaborator;
  }

  getStatistics(): InferenceStatistics {
    return this.aggregator.snapshot();
  }

  /**
   * Begin a new session that submits every `interval`-th observed frame.
   * A running session is stopped first and its statistics discarded.
   */
  async startSampling(interval: number): Promise<void> {
    await this.stopSampling();

    const every = Number.isFinite(interval) ? Math.max(1, Math.floor(interval)) : 1;
    const session: SamplingSession = {
      interval: every,
      abort: new AbortController(),
      loop: Promise.resolve(),
    };
    this.aggregator.reset(this.options.now());
    this.session = session;

    if (!this.collaborator) {
      this.emitStatus('warning', 'No inference collaborator configured; frames will only be counted');
    }
    this.emitStatus('info', `Sampling every ${every} frame${every === 1 ? '' : 's'}`);
    session.loop = this.sampleLoop(session);
  }

  /**
   * Stop the current session. Idempotent.
   */
  stopSampling(): Promise<void> {
    const session = this.session;
    if (!session) return this.stopping;

    this.session = null;
    this.stopping = this.teardown(session);
    return this.stopping;
  }

  async dispose(): Promise<void> {
    await this.stopSampling();
    this.processedFrameSubject.complete();
    this.statisticsSubject.complete();
    this.statusSubject.complete();
    this.errorSubject.complete();
    this.finishedSubject.complete();
  }

  private async sampleLoop(session: SamplingSession): Promise<void> {
    const { signal } = session.abort;
    let observed = 0;

    try {
      while (!signal.aborted) {
        const frame = this.frames.getCurrentFrame();
        if (!frame) {
          await delay(this.options.emptySlotDelayMs, signal);
          continue;
        }

        observed++;
        this.aggregator.recordObservation();
        if (observed % session.interval === 0) {
          await this.sample(session, frame);
        }

        await delay(this.options.pollDelayMs, signal);
      }
    } catch (error) {
      this.emitStatus('warning', `Sampling loop failed: ${describeError(error)}`);
    }
  }

  private async sample(session: SamplingSession, frame: Frame): Promise<void> {
    const collaborator = this.collaborator;
    if (!collaborator) return;

    const startedAt = this.options.now();
    this.aggregator.recordSubmission();
    let result: InferenceResult;
    try {
      result = validateInferenceResult(
        await collaborator.processFrame(frame),
        frame.index
      );
    } catch (error) {
      if (session.abort.signal.aborted) return;
      this.reportError(
        error instanceof InferenceCallError
          ? error
          : new InferenceCallError(frame.index, describeError(error), { cause: error })
      );
      return;
    }

    // Results that arrive after stopSampling() are dropped
    if (session.abort.signal.aborted) return;

    const statistics = this.aggregator.record({
      latencyMs: this.options.now() - startedAt,
      startedAt,
      detectionCount: result.detectionCount,
      averageConfidence: result.averageConfidence,
      classLabel: result.classLabel,
    });

    let display: DisplayFrame | null = null;
    try {
      display = toDisplayFrame(result.annotatedFrame ?? frame);
    } catch (error) {
      this.reportError(
        new InferenceCallError(
          frame.index,
          `Unusable annotated frame: ${describeError(error)}`,
          { cause: error }
        )
      );
    }

    if (display) {
      this.processedFrameSubject.next({ sourceIndex: frame.index, frame: display, result });
    }
    this.statisticsSubject.next(statistics);
  }

  private async teardown(session: SamplingSession): Promise<void> {
    session.abort.abort();

    const outcome = await settleWithin(session.loop, this.options.joinTimeoutMs);
    if (outcome === 'timeout') {
      const warning = new ResourceReleaseTimeout(
        'Sampling loop',
        this.options.joinTimeoutMs
      );
      this.emitStatus('warning', warning.message);
    }

    const { totalFramesProcessed } = this.aggregator.snapshot();
    this.emitStatus('info', `Sampling stopped after ${totalFramesProcessed} inferences`);
    this.finishedSubject.next();
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
