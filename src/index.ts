/**
 * Media Inference Pipeline
 *
 * Plays a still image, video file or camera at its native pace and samples
 * the latest frame for an asynchronous inference collaborator.
 */

export {
  configFromEnv,
  DEFAULT_PIPELINE_CONFIG,
  type PipelineConfig,
  pipelineConfigSchema,
  resolvePipelineConfig,
} from './config/pipelineConfig';
export {
  buildCaptureArgs,
  type CameraOptions,
  CameraMediaSource,
  type CaptureHandle,
  type CaptureInputFormat,
  DEFAULT_CAMERA_OPTIONS,
  type SpawnCapture,
  spawnFfmpeg,
} from './pipeline/CameraMediaSource';
export { CurrentFrameSlot } from './pipeline/CurrentFrameSlot';
export {
  ConfigurationError,
  DecodeReadError,
  describeError,
  describeSource,
  InferenceCallError,
  PipelineError,
  type PipelineErrorKind,
  ResourceReleaseTimeout,
  SourceOpenError,
} from './pipeline/errors';
export {
  DEFAULT_SAMPLER_OPTIONS,
  type FrameProvider,
  FrameSampler,
  type FrameSamplerOptions,
  type ProcessedFrame,
} from './pipeline/FrameSampler';
export { Gate } from './pipeline/Gate';
export {
  type CollaboratorFactory,
  CollaboratorRegistry,
  INFERENCE_TASKS,
  type InferenceCollaborator,
  type InferenceConfig,
  type InferenceResult,
  type InferenceTask,
  inferenceResultSchema,
  samplingIntervalForDelay,
  validateInferenceResult,
} from './pipeline/InferenceCollaborator';
export {
  clampFrameIndex,
  DEFAULT_FRAME_RATE,
  FALLBACK_TOTAL_FRAMES,
  type MediaSource,
  type MediaSourceOpener,
  type MediaSourceType,
  resolveProperties,
} from './pipeline/MediaSource';
export {
  createMediaSourceOpener,
  IMAGE_EXTENSIONS,
  isStillImagePath,
  openMediaSource,
  parseSourceIdentifier,
  VIDEO_EXTENSIONS,
} from './pipeline/MediaSourceFactory';
export {
  type DisplaySurface,
  formatTime,
  type MediaMode,
  PipelineController,
  type PipelineControllerOptions,
  PROGRESS_SCALE,
  type ProgressDisplay,
} from './pipeline/PipelineController';
export {
  DEFAULT_PLAYBACK_OPTIONS,
  PlaybackEngine,
  type PlaybackEngineOptions,
} from './pipeline/PlaybackEngine';
export {
  emptyStatistics,
  type InferenceSample,
  type InferenceStatistics,
  StatisticsAggregator,
} from './pipeline/StatisticsAggregator';
export { loadStillImage, StillImageMediaSource } from './pipeline/StillImageMediaSource';
export { VideoFileMediaSource } from './pipeline/VideoFileMediaSource';
export {
  createMockCollaborator,
  createMockCollaboratorFactory,
  type MockCollaboratorOptions,
  type MockInferenceCollaborator,
} from './services/MockInferenceCollaborator';
export {
  createSyntheticOpener,
  SyntheticMediaSource,
  type SyntheticSourceOptions,
} from './services/SyntheticMediaSource';
export type {
  ColorRange,
  DisplayFrame,
  Frame,
  MediaProperties,
  PixelFormat,
  PlaybackProgress,
  PlaybackState,
  ReadResult,
  SourceIdentifier,
  StatusMessage,
} from './types/media';
export { createLogger, type Logger, type LogLevel, setLogLevel } from './utils/logger';
export { toDisplayFrame } from './utils/pixelFormat';
export { decodePnm, encodePpm } from './utils/pnm';
