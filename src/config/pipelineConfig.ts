/**
 * Pipeline Configuration
 *
 * Every tunable of the pipeline, validated with zod. Partial input is
 * filled in from the defaults, so `resolvePipelineConfig({})` is the
 * default configuration.
 */

import { z } from 'zod';
import { ConfigurationError } from '../pipeline/errors';
import { INFERENCE_TASKS } from '../pipeline/InferenceCollaborator';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const playbackSchema = z
  .object({
    loopAtEnd: z.boolean().default(true),
    joinTimeoutMs: positiveInt.default(1000),
    readRetryDelayMs: nonNegativeInt.default(20),
  })
  .default({});

const samplingSchema = z
  .object({
    emptySlotDelayMs: positiveInt.default(100),
    pollDelayMs: nonNegativeInt.default(50),
    joinTimeoutMs: positiveInt.default(1000),
    /** Fixed frame interval; derived from inference.delayMs when absent */
    interval: positiveInt.optional(),
  })
  .default({});

const cameraSchema = z
  .object({
    ffmpegPath: z.string().min(1).default('ffmpeg'),
    inputFormat: z.enum(['v4l2', 'avfoundation']).default('v4l2'),
    width: positiveInt.default(640),
    height: positiveInt.default(480),
    openTimeoutMs: positiveInt.default(5000),
    readTimeoutMs: positiveInt.default(2000),
    warmupFrames: nonNegativeInt.default(3),
    bufferSize: positiveInt.default(1),
  })
  .default({});

const inferenceSchema = z
  .object({
    task: z.enum(INFERENCE_TASKS).default('detection'),
    model: z.string().min(1).optional(),
    confidenceThreshold: z.number().min(0).max(1).default(0.25),
    delayMs: nonNegativeInt.default(100),
  })
  .default({});

export const pipelineConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  playback: playbackSchema,
  sampling: samplingSchema,
  camera: cameraSchema,
  inference: inferenceSchema,
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

/**
 * Validate `input` and fill in defaults.
 * Throws ConfigurationError listing every invalid field.
 */
export function resolvePipelineConfig(input: unknown = {}): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid pipeline configuration: ${problems}`);
  }
  return parsed.data;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = resolvePipelineConfig({});

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${value}"`);
}

/**
 * Configuration from PIPELINE_* environment variables, on top of defaults
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const input: {
    logLevel?: string;
    playback?: { loopAtEnd?: boolean };
    sampling?: { interval?: number };
    camera?: { ffmpegPath?: string };
  } = {};

  if (env.PIPELINE_LOG_LEVEL) {
    input.logLevel = env.PIPELINE_LOG_LEVEL.trim().toLowerCase();
  }
  if (env.PIPELINE_SAMPLING_INTERVAL) {
    input.sampling = { interval: Number(env.PIPELINE_SAMPLING_INTERVAL) };
  }
  if (env.PIPELINE_FFMPEG_PATH) {
    input.camera = { ffmpegPath: env.PIPELINE_FFMPEG_PATH };
  }
  if (env.PIPELINE_LOOP_AT_END) {
    input.playback = {
      loopAtEnd: parseBoolean('PIPELINE_LOOP_AT_END', env.PIPELINE_LOOP_AT_END),
    };
  }

  return resolvePipelineConfig(input);
}
