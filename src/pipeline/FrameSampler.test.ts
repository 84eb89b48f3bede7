import type { Subscription } from 'rxjs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createMockCollaborator } from '../services/MockInferenceCollaborator';
import type { Frame, StatusMessage } from '../types/media';
import { setLogLevel } from '../utils/logger';
import { InferenceCallError, type PipelineError } from './errors';
import { type FrameProvider, FrameSampler, type ProcessedFrame } from './FrameSampler';
import type { InferenceCollaborator } from './InferenceCollaborator';
import type { InferenceStatistics } from './StatisticsAggregator';

function grayFrame(index: number): Frame {
  return {
    index,
    timestamp: index / 25,
    width: 2,
    height: 2,
    format: 'gray8',
    data: new Uint8Array(4).fill(index % 256),
  };
}

/**
 * Provider whose every read returns the next frame in sequence,
 * after `emptyReads` reads that find nothing
 */
function sequenceProvider(emptyReads = 0): FrameProvider {
  let reads = 0;
  let next = 0;
  return {
    getCurrentFrame: () => (reads++ < emptyReads ? null : grayFrame(next++)),
  };
}

describe('FrameSampler', () => {
  let sampler: FrameSampler;
  let processed: ProcessedFrame[];
  let statistics: InferenceStatistics[];
  let statuses: StatusMessage[];
  let errors: PipelineError[];
  let finished: number;
  let subscriptions: Subscription[];

  function createSampler(provider: FrameProvider = sequenceProvider(), joinTimeoutMs = 1000) {
    sampler = new FrameSampler(provider, { now: () => Date.now(), joinTimeoutMs });
    subscriptions = [
      sampler.processedFrame$.subscribe((frame) => processed.push(frame)),
      sampler.statistics$.subscribe((stats) => statistics.push(stats)),
      sampler.status$.subscribe((status) => statuses.push(status)),
      sampler.error$.subscribe((error) => errors.push(error)),
      sampler.finished$.subscribe(() => finished++),
    ];
  }

  beforeEach(() => {
    vi.useFakeTimers();
    setLogLevel('error');
    processed = [];
    statistics = [];
    statuses = [];
    errors = [];
    finished = 0;
    subscriptions = [];
  });

  afterEach(async () => {
    await sampler.dispose();
    for (const subscription of subscriptions) subscription.unsubscribe();
    setLogLevel('info');
    vi.useRealTimers();
  });

  it('submits every Nth observed frame', async () => {
    createSampler();
    const collaborator = createMockCollaborator({ respond: () => ({ detectionCount: 1 }) });
    sampler.setInferenceCollaborator(collaborator);

    await sampler.startSampling(5);
    await vi.advanceTimersByTimeAsync(50 * 19);

    expect(collaborator.seenFrames).toEqual([4, 9, 14, 19]);
    expect(processed.map((p) => p.sourceIndex)).toEqual([4, 9, 14, 19]);
    expect(statistics).toHaveLength(4);
    expect(sampler.getStatistics()).toMatchObject({
      framesObserved: 20,
      totalFramesProcessed: 4,
      totalDetections: 4,
    });
  });

  it('counts observations without submitting when no collaborator is set', async () => {
    createSampler();

    await sampler.startSampling(1);
    await vi.advanceTimersByTimeAsync(100);

    expect(sampler.getStatistics()).toMatchObject({
      framesObserved: 3,
      totalFramesProcessed: 0,
    });
    expect(statistics).toEqual([]);
    expect(statuses).toContainEqual({
      level: 'warning',
      message: 'No inference collaborator configured; frames will only be counted',
    });
  });

  it('waits for the first frame before counting', async () => {
    createSampler(sequenceProvider(2));

    await sampler.startSampling(1);
    await vi.advanceTimersByTimeAsync(150);
    expect(sampler.getStatistics().framesObserved).toBe(0);

    await vi.advanceTimersByTimeAsync(50);
    expect(sampler.getStatistics().framesObserved).toBe(1);
  });

  it('measures latency and fps from the clock', async () => {
    createSampler();
    sampler.setInferenceCollaborator(createMockCollaborator({ latencyMs: 30 }));

    await sampler.startSampling(1);
    await vi.advanceTimersByTimeAsync(110);

    const stats = sampler.getStatistics();
    expect(stats.totalFramesProcessed).toBe(2);
    expect(stats.totalInferenceTimeMs).toBe(60);
    expect(stats.averageInferenceTimeMs).toBe(30);
    expect(stats.instantaneousFps).toBeCloseTo(12.5);
  });

  it('shows the annotated frame when the collaborator returns one', async () => {
    createSampler();
    sampler.setInferenceCollaborator(
      createMockCollaborator({
        respond: (frame) => ({
          annotatedFrame: {
            index: frame.index,
            timestamp: frame.timestamp,
            width: 1,
            height: 1,
            format: 'rgb24',
            data: new Uint8Array([9, 8, 7]),
          },
        }),
      })
    );

    await sampler.startSampling(1);
    await vi.advanceTimersByTimeAsync(0);

    expect(processed).toHaveLength(1);
    expect(processed[0].sourceIndex).toBe(0);
    expect(Array.from(processed[0].frame.data)).toEqual([9, 8, 7]);
  });

  it('shows the sampled frame when there is no annotation', async () => {
    createSampler();
    sampler.setInferenceCollaborator(createMockCollaborator());

    await sampler.startSampling(1);
    await vi.advanceTimersByTimeAsync(0);

    expect(processed[0].frame).toMatchObject({ format: 'rgb24', width: 2, height: 2 });
    expect(processed[0].frame.data.length).toBe(12);
  });

  it('reports a failing inference and keeps sampling', async () => {
    createSampler();
    const collaborator: InferenceCollaborator = {
      task: 'detection',
      processFrame: (frame) => {
        if (frame.index === 0) throw new Error('model exploded');
        return { detectionCount: 2 };
      },
    };
    sampler.setInferenceCollaborator(collaborator);

    await sampler.startSampling(1);
    await vi.advanceTimersByTimeAsync(50);

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(InferenceCallError);
    expect(errors[0].message).toBe('Inference failed on frame 0: model exploded');
    expect(sampler.getStatistics()).toMatchObject({
      framesSubmitted: 2,
      totalFramesProcessed: 1,
    });
  });

  it('reports rejected promises and invalid results', async () => {
    createSampler();
    sampler.setInferenceCollaborator({
      task: 'classification',
      processFrame: async (frame) => {
        if (frame.index === 0) throw new Error('timeout talking to model');
        return { classLabel: { name: '', confidence: 2 } };
      },
    });

    await sampler.startSampling(1);
    await vi.advanceTimersByTimeAsync(50);

    expect(errors.map((e) => e.message)).toEqual([
      'Inference failed on frame 0: timeout talking to model',
      'Inference failed on frame 1: Invalid result (classLabel.name: String must contain at least 1 character(s); classLabel.confidence: Number must be less than or equal to 1)',
    ]);
    expect(sampler.getStatistics()).toMatchObject({
      framesSubmitted: 2,
      totalFramesProcessed: 0,
    });
  });

  it('stopSampling is idempotent and finishes once per session', async () => {
    createSampler();

    await sampler.startSampling(1);
    await sampler.stopSampling();
    await sampler.stopSampling();

    expect(sampler.isRunning).toBe(false);
    expect(finished).toBe(1);
  });

  it('startSampling while running restarts the session', async () => {
    createSampler();
    sampler.setInferenceCollaborator(createMockCollaborator());

    await sampler.startSampling(1);
    await vi.advanceTimersByTimeAsync(100);
    expect(sampler.getStatistics().totalFramesProcessed).toBe(3);

    await sampler.startSampling(2);

    expect(finished).toBe(1);
    expect(sampler.isRunning).toBe(true);
    expect(sampler.getStatistics().totalFramesProcessed).toBe(0);
  });

  it('gives up waiting for a slow inference and drops its result', async () => {
    createSampler(sequenceProvider(), 100);
    sampler.setInferenceCollaborator(createMockCollaborator({ latencyMs: 500 }));

    await sampler.startSampling(1);
    const stopping = sampler.stopSampling();
    await vi.advanceTimersByTimeAsync(100);
    await stopping;

    expect(statuses).toContainEqual({
      level: 'warning',
      message: 'Sampling loop did not stop within 100ms',
    });
    expect(finished).toBe(1);

    await vi.advanceTimersByTimeAsync(500);
    expect(statistics).toEqual([]);
  });
});
