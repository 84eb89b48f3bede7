/**
 * InferenceCollaborator - the model the pipeline feeds sampled frames to
 *
 * The pipeline treats inference as opaque: a collaborator takes a frame and
 * returns a result bundle, synchronously or as a promise. Results are
 * validated before anything downstream uses them.
 *
 * Collaborators are created by task through a CollaboratorRegistry, once,
 * when inference is configured.
 */

import { z } from 'zod';
import type { Frame } from '../types/media';
import { ConfigurationError, InferenceCallError } from './errors';

export const INFERENCE_TASKS = ['detection', 'classification', 'pose', 'tracking'] as const;

export type InferenceTask = (typeof INFERENCE_TASKS)[number];

/**
 * Settings handed to a collaborator factory
 */
export interface InferenceConfig {
  task: InferenceTask;
  /** Model identifier, interpreted by the factory */
  model?: string;
  /** Minimum confidence for a detection to count */
  confidenceThreshold: number;
  /** Delay between samples; converted to a frame interval for sampling */
  delayMs: number;
}

export interface InferenceResult {
  /** Frame with detections drawn on it; the input frame is shown if omitted */
  annotatedFrame?: Frame;
  detectionCount?: number;
  /** Mean detection confidence, 0..1 */
  averageConfidence?: number;
  /** Top class, for classification tasks */
  classLabel?: { name: string; confidence: number };
}

export interface InferenceCollaborator {
  readonly task: InferenceTask;
  processFrame(frame: Frame): InferenceResult | Promise<InferenceResult>;
  dispose?(): void | Promise<void>;
}

export type CollaboratorFactory = (
  config: InferenceConfig
) => InferenceCollaborator | Promise<InferenceCollaborator>;

const unitInterval = z.number().min(0).max(1);

const frameSchema = z.object({
  index: z.number().int().nonnegative(),
  timestamp: z.number().nonnegative(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  format: z.enum(['rgb24', 'bgr24', 'gray8', 'yuv420p', 'yuv444p']),
  colorRange: z.enum(['full', 'limited']).optional(),
  data: z.instanceof(Uint8Array),
});

export const inferenceResultSchema = z.object({
  annotatedFrame: frameSchema.optional(),
  detectionCount: z.number().int().nonnegative().optional(),
  averageConfidence: unitInterval.optional(),
  classLabel: z
    .object({
      name: z.string().min(1),
      confidence: unitInterval,
    })
    .optional(),
});

/**
 * Check a collaborator's return value.
 * Throws InferenceCallError listing every problem found.
 */
export function validateInferenceResult(
  value: unknown,
  frameIndex: number
): InferenceResult {
  const parsed = inferenceResultSchema.safeParse(value);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'result'}: ${issue.message}`)
      .join('; ');
    throw new InferenceCallError(frameIndex, `Invalid result (${problems})`);
  }
  return parsed.data;
}

/**
 * Frame interval used when sampling with a delay of `delayMs`
 */
export function samplingIntervalForDelay(delayMs: number): number {
  return Math.max(1, Math.floor(delayMs / 10));
}

export class CollaboratorRegistry {
  private readonly factories = new Map<InferenceTask, CollaboratorFactory>();

  register(task: InferenceTask, factory: CollaboratorFactory): this {
    this.factories.set(task, factory);
    return this;
  }

  has(task: InferenceTask): boolean {
    return this.factories.has(task);
  }

  tasks(): InferenceTask[] {
    return [...this.factories.keys()];
  }

  /**
   * Build the collaborator for `config.task`
   */
  async resolve(config: InferenceConfig): Promise<InferenceCollaborator> {
    const factory = this.factories.get(config.task);
    if (!factory) {
      throw new ConfigurationError(
        `No inference collaborator registered for task "${config.task}"`
      );
    }
    return factory(config);
  }
}
