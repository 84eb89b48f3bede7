/**
 * PipelineController - wires user commands to the engine and the sampler
 *
 * Owns one PlaybackEngine and one FrameSampler reading from it, and forwards
 * everything they publish to a DisplaySurface. Raw playback frames are shown
 * only while inference is off; processed frames are always shown.
 */

import { writeFile } from 'node:fs/promises';
import { Subscription } from 'rxjs';
import { concatMap, filter } from 'rxjs/operators';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from '../config/pipelineConfig';
import type {
  DisplayFrame,
  Frame,
  PlaybackProgress,
  PlaybackState,
  StatusMessage,
} from '../types/media';
import { createLogger, setLogLevel } from '../utils/logger';
import { copyFrame, toDisplayFrame } from '../utils/pixelFormat';
import { encodePpm } from '../utils/pnm';
import { describeError, InferenceCallError, SourceOpenError } from './errors';
import { FrameSampler } from './FrameSampler';
import {
  type CollaboratorRegistry,
  type InferenceCollaborator,
  type InferenceConfig,
  samplingIntervalForDelay,
  validateInferenceResult,
} from './InferenceCollaborator';
import type { MediaSourceOpener } from './MediaSource';
import { createMediaSourceOpener, isStillImagePath } from './MediaSourceFactory';
import { PlaybackEngine } from './PlaybackEngine';
import { type InferenceStatistics, StatisticsAggregator } from './StatisticsAggregator';
import { loadStillImage } from './StillImageMediaSource';

const log = createLogger({ component: 'PipelineController' });

export type MediaMode = 'video' | 'camera' | 'image';

/** Resolution of the progress value */
export const PROGRESS_SCALE = 1000;

export interface ProgressDisplay {
  /** 0..PROGRESS_SCALE */
  value: number;
  currentTime: string;
  totalTime: string;
}

/**
 * Whatever presents the pipeline: a window, a terminal, a test double
 */
export interface DisplaySurface {
  showFrame(frame: DisplayFrame): void;
  showProgress(progress: ProgressDisplay): void;
  showStatistics(statistics: InferenceStatistics): void;
  showStatus(status: StatusMessage): void;
  showError(message: string): void;
  /** Playback ended by itself: end of media, end of stream or nothing decodable */
  showFinished(): void;
}

export interface PipelineControllerOptions {
  surface: DisplaySurface;
  registry: CollaboratorRegistry;
  config?: PipelineConfig;
  /** Replaces the file/camera opener, e.g. with a synthetic source */
  openSource?: MediaSourceOpener;
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

/**
 * MM:SS, or --:-- when the time is unknown
 */
export function formatTime(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) return '--:--';
  const whole = Math.floor(seconds);
  const minutes = Math.floor(whole / 60);
  const rest = whole % 60;
  return `${String(minutes).padStart(2, '0')}:${String(rest).padStart(2, '0')}`;
}

export class PipelineController {
  readonly engine: PlaybackEngine;
  readonly sampler: FrameSampler;

  private readonly surface: DisplaySurface;
  private readonly registry: CollaboratorRegistry;
  private readonly config: PipelineConfig;
  private readonly now: () => number;
  private readonly subscriptions = new Subscription();

  private mode: MediaMode | null = null;
  private stillImage: Frame | null = null;
  private collaborator: InferenceCollaborator | null = null;
  private inferenceConfig: InferenceConfig | null = null;
  private processing = false;
  /** Set while stopAll() tears playback down on purpose */
  private releasing = false;

  constructor(options: PipelineControllerOptions) {
    this.surface = options.surface;
    this.registry = options.registry;
    this.config = options.config ?? DEFAULT_PIPELINE_CONFIG;
    this.now = options.now ?? (() => performance.now());
    setLogLevel(this.config.logLevel);

    const { playback, sampling, camera } = this.config;
    this.engine = new PlaybackEngine({
      openSource: options.openSource ?? createMediaSourceOpener(camera),
      loopAtEnd: playback.loopAtEnd,
      joinTimeoutMs: playback.joinTimeoutMs,
      readRetryDelayMs: playback.readRetryDelayMs,
      now: this.now,
    });
    this.sampler = new FrameSampler(this.engine, {
      emptySlotDelayMs: sampling.emptySlotDelayMs,
      pollDelayMs: sampling.pollDelayMs,
      joinTimeoutMs: sampling.joinTimeoutMs,
      now: this.now,
    });

    this.subscribe();
  }

  get mediaMode(): MediaMode | null {
    return this.mode;
  }

  get isProcessing(): boolean {
    return this.processing;
  }

  get playbackState(): PlaybackState {
    return this.engine.state;
  }

  async openVideo(path: string): Promise<void> {
    await this.stopAll();
    await this.engine.play({ kind: 'file', path });
    this.mode = this.engine.state === 'idle' ? null : 'video';
  }

  async openCamera(deviceIndex: number): Promise<void> {
    await this.stopAll();
    await this.engine.playCamera(deviceIndex);
    this.mode = this.engine.state === 'idle' ? null : 'camera';
  }

  async openImage(path: string): Promise<void> {
    if (!isStillImagePath(path)) {
      this.surface.showError(new SourceOpenError({ kind: 'file', path }, 'Not a still image').message);
      return;
    }

    await this.stopAll();
    let image: Frame;
    try {
      image = await loadStillImage(path);
    } catch (error) {
      this.surface.showError(describeError(error));
      return;
    }
    this.stillImage = image;
    this.mode = 'image';
    this.surface.showFrame(toDisplayFrame(image));
    this.showStatus('info', `Loaded image ${path}`);
  }

  togglePlayPause(): void {
    if (this.engine.state === 'playing') {
      this.engine.pause();
    } else if (this.engine.state === 'paused') {
      this.engine.resume();
    }
  }

  /**
   * Seek to a position on the 0..PROGRESS_SCALE progress scale
   */
  async seekToProgress(value: number): Promise<void> {
    const properties = this.engine.getProperties();
    if (this.mode !== 'video' || !properties) return;

    const clamped = Math.min(Math.max(value, 0), PROGRESS_SCALE);
    const frameIndex = Math.floor((clamped / PROGRESS_SCALE) * properties.totalFrameCount);
    await this.engine.seek(frameIndex);
  }

  /**
   * Resolve the collaborator for `config.task`. Unset fields come from the
   * pipeline configuration.
   *
   * @returns false if no collaborator could be created
   */
  async configureInference(config: Partial<InferenceConfig> = {}): Promise<boolean> {
    const resolved: InferenceConfig = { ...this.config.inference, ...config };

    let collaborator: InferenceCollaborator;
    try {
      collaborator = await this.registry.resolve(resolved);
    } catch (error) {
      this.surface.showError(describeError(error));
      return false;
    }

    const wasProcessing = this.processing;
    await this.stopInference();
    await this.disposeCollaborator();

    this.collaborator = collaborator;
    this.inferenceConfig = resolved;
    this.sampler.setInferenceCollaborator(collaborator);
    this.showStatus('info', `Inference ready: ${resolved.task}${resolved.model ? ` (${resolved.model})` : ''}`);

    if (wasProcessing) {
      await this.startInference();
    }
    return true;
  }

  async startInference(): Promise<void> {
    if (!this.mode) {
      this.surface.showError('Open a video, camera or image first');
      return;
    }
    if (!this.collaborator || !this.inferenceConfig) {
      this.surface.showError('Configure inference before starting it');
      return;
    }

    if (this.mode === 'image') {
      await this.inferStillImage(this.collaborator);
      return;
    }

    const interval =
      this.config.sampling.interval ?? samplingIntervalForDelay(this.inferenceConfig.delayMs);
    await this.sampler.startSampling(interval);
    this.processing = true;
  }

  async stopInference(): Promise<void> {
    this.processing = false;
    await this.sampler.stopSampling();
  }

  /**
   * Stop inference and playback and forget the current media
   */
  async stopAll(): Promise<void> {
    this.releasing = true;
    try {
      await this.stopInference();
      await this.engine.stop();
    } finally {
      this.releasing = false;
    }
    this.mode = null;
    this.stillImage = null;
  }

  /**
   * Write the current frame as a binary PPM
   *
   * @returns false if there was no frame or the write failed
   */
  async saveSnapshot(path: string): Promise<boolean> {
    const frame = this.mode === 'image' ? this.stillImage : this.engine.getCurrentFrame();
    if (!frame) {
      this.surface.showError('No frame to save');
      return false;
    }

    try {
      await writeFile(path, encodePpm(toDisplayFrame(frame)));
    } catch (error) {
      this.surface.showError(`Failed to save snapshot: ${describeError(error)}`);
      return false;
    }
    this.showStatus('info', `Saved snapshot to ${path}`);
    return true;
  }

  async dispose(): Promise<void> {
    await this.stopAll();
    await this.disposeCollaborator();
    this.subscriptions.unsubscribe();
    await this.sampler.dispose();
    await this.engine.dispose();
  }

  private subscribe(): void {
    const { engine, sampler, surface } = this;

    this.subscriptions.add(
      engine.frameReady$.subscribe((frame) => {
        if (!this.processing) surface.showFrame(frame);
      })
    );
    this.subscriptions.add(
      engine.progress$.subscribe((progress) => surface.showProgress(this.toProgressDisplay(progress)))
    );
    this.subscriptions.add(sampler.processedFrame$.subscribe((processed) => surface.showFrame(processed.frame)));
    this.subscriptions.add(sampler.statistics$.subscribe((stats) => surface.showStatistics(stats)));
    this.subscriptions.add(
      sampler.finished$.subscribe(() => {
        this.processing = false;
      })
    );
    this.subscriptions.add(
      engine.finished$
        .pipe(
          filter(() => !this.releasing),
          concatMap(() => this.onPlaybackEnded())
        )
        .subscribe()
    );

    for (const status$ of [engine.status$, sampler.status$]) {
      this.subscriptions.add(status$.subscribe((status) => surface.showStatus(status)));
    }
    for (const error$ of [engine.error$, sampler.error$]) {
      this.subscriptions.add(error$.subscribe((error) => surface.showError(error.message)));
    }
  }

  private async onPlaybackEnded(): Promise<void> {
    this.mode = null;
    await this.stopInference();
    log.info('Playback ended', { action: 'finished' });
    this.surface.showFinished();
  }

  private toProgressDisplay(progress: PlaybackProgress): ProgressDisplay {
    const { currentIndex, totalFrames, currentTime } = progress;
    const duration = this.engine.getProperties()?.duration ?? 0;
    const value =
      totalFrames > 0
        ? Math.min(PROGRESS_SCALE, Math.floor((currentIndex / totalFrames) * PROGRESS_SCALE))
        : 0;

    return {
      value,
      currentTime: formatTime(currentTime),
      totalTime: duration > 0 ? formatTime(duration) : '--:--',
    };
  }

  private async inferStillImage(collaborator: InferenceCollaborator): Promise<void> {
    const image = this.stillImage;
    if (!image) return;

    const aggregator = new StatisticsAggregator(this.now());
    aggregator.recordObservation();
    const startedAt = this.now();
    aggregator.recordSubmission();
    try {
      const result = validateInferenceResult(
        await collaborator.processFrame(copyFrame(image)),
        image.index
      );
      const statistics = aggregator.record({
        latencyMs: this.now() - startedAt,
        startedAt,
        detectionCount: result.detectionCount,
        averageConfidence: result.averageConfidence,
        classLabel: result.classLabel,
      });
      this.surface.showFrame(toDisplayFrame(result.annotatedFrame ?? image));
      this.surface.showStatistics(statistics);
    } catch (error) {
      const failure =
        error instanceof InferenceCallError
          ? error
          : new InferenceCallError(image.index, describeError(error), { cause: error });
      log.error(failure.message, failure);
      this.surface.showError(failure.message);
    }
  }

  private async disposeCollaborator(): Promise<void> {
    const collaborator = this.collaborator;
    this.collaborator = null;
    this.sampler.setInferenceCollaborator(null);
    if (!collaborator?.dispose) return;
    try {
      await collaborator.dispose();
    } catch (error) {
      log.warn(`Failed to dispose ${collaborator.task} collaborator: ${describeError(error)}`);
    }
  }

  private showStatus(level: StatusMessage['level'], message: string): void {
    log.info(message);
    this.surface.showStatus({ level, message });
  }
}
