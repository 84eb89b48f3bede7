/**
 * MockInferenceCollaborator
 *
 * A stand-in model that answers with scripted results. Used in tests and to
 * run the pipeline end to end without a real model.
 */

import type {
  CollaboratorFactory,
  InferenceCollaborator,
  InferenceResult,
  InferenceTask,
} from '../pipeline/InferenceCollaborator';
import type { Frame } from '../types/media';
import { delay } from '../utils/timing';

export interface MockCollaboratorOptions {
  task?: InferenceTask;
  /** Result for each frame; an empty result when omitted */
  respond?: (frame: Frame) => InferenceResult;
  /** Simulated inference time per frame (ms) */
  latencyMs?: number;
}

export interface MockInferenceCollaborator extends InferenceCollaborator {
  /** Indices of every frame handed to processFrame */
  readonly seenFrames: number[];
  readonly disposed: boolean;
}

export function createMockCollaborator(
  options: MockCollaboratorOptions = {}
): MockInferenceCollaborator {
  const { task = 'detection', respond = () => ({}), latencyMs = 0 } = options;
  const seenFrames: number[] = [];
  let disposed = false;

  return {
    task,
    seenFrames,
    get disposed() {
      return disposed;
    },

    async processFrame(frame: Frame): Promise<InferenceResult> {
      seenFrames.push(frame.index);
      if (latencyMs > 0) {
        await delay(latencyMs);
      }
      return respond(frame);
    },

    dispose(): void {
      disposed = true;
    },
  };
}

/**
 * Factory that builds mock collaborators for the configured task
 */
export function createMockCollaboratorFactory(
  options: Omit<MockCollaboratorOptions, 'task'> = {}
): CollaboratorFactory {
  return (config) => createMockCollaborator({ ...options, task: config.task });
}
