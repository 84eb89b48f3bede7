/**
 * StatisticsAggregator - running totals for one sampling session
 *
 * Pure bookkeeping: the FrameSampler feeds it observations and completed
 * inferences and publishes the snapshots it returns.
 */

export interface InferenceStatistics {
  /** Frames read from the slot, sampled or not */
  framesObserved: number;
  /** Frames handed to the collaborator, whether or not inference succeeded */
  framesSubmitted: number;
  /** Frames whose inference completed */
  totalFramesProcessed: number;
  totalInferenceTimeMs: number;
  averageInferenceTimeMs: number;
  lastInferenceTimeMs: number;
  /** 1 / seconds between the starts of the last two completed samples */
  instantaneousFps: number;
  totalDetections: number;
  lastDetectionCount: number;
  /** 0..1 */
  lastAverageConfidence: number;
  lastClassLabel: string | null;
  lastClassConfidence: number;
  /** Label -> number of samples it topped */
  classDistribution: Record<string, number>;
}

/**
 * One completed inference
 */
export interface InferenceSample {
  latencyMs: number;
  /** Clock reading (ms) when the frame was submitted */
  startedAt: number;
  detectionCount?: number;
  averageConfidence?: number;
  classLabel?: { name: string; confidence: number };
}

export function emptyStatistics(): InferenceStatistics {
  return {
    framesObserved: 0,
    framesSubmitted: 0,
    totalFramesProcessed: 0,
    totalInferenceTimeMs: 0,
    averageInferenceTimeMs: 0,
    lastInferenceTimeMs: 0,
    instantaneousFps: 0,
    totalDetections: 0,
    lastDetectionCount: 0,
    lastAverageConfidence: 0,
    lastClassLabel: null,
    lastClassConfidence: 0,
    classDistribution: {},
  };
}

export class StatisticsAggregator {
  private stats = emptyStatistics();
  private previousSampleAt: number;

  constructor(startedAt = 0) {
    this.previousSampleAt = startedAt;
  }

  /**
   * Start a new session; fps of the first sample is measured from `startedAt`
   */
  reset(startedAt: number): void {
    this.stats = emptyStatistics();
    this.previousSampleAt = startedAt;
  }

  recordObservation(): void {
    this.stats.framesObserved++;
  }

  recordSubmission(): void {
    this.stats.framesSubmitted++;
  }

  record(sample: InferenceSample): InferenceStatistics {
    const stats = this.stats;

    stats.totalFramesProcessed++;
    stats.totalInferenceTimeMs += sample.latencyMs;
    stats.lastInferenceTimeMs = sample.latencyMs;
    stats.averageInferenceTimeMs =
      stats.totalInferenceTimeMs / stats.totalFramesProcessed;

    const intervalSeconds = (sample.startedAt - this.previousSampleAt) / 1000;
    stats.instantaneousFps = intervalSeconds > 0 ? 1 / intervalSeconds : 0;
    this.previousSampleAt = sample.startedAt;

    if (sample.detectionCount !== undefined) {
      stats.totalDetections += sample.detectionCount;
      stats.lastDetectionCount = sample.detectionCount;
    }
    if (sample.averageConfidence !== undefined) {
      stats.lastAverageConfidence = sample.averageConfidence;
    }
    if (sample.classLabel) {
      const { name, confidence } = sample.classLabel;
      stats.lastClassLabel = name;
      stats.lastClassConfidence = confidence;
      stats.classDistribution[name] = (stats.classDistribution[name] ?? 0) + 1;
    }

    return this.snapshot();
  }

  snapshot(): InferenceStatistics {
    return { ...this.stats, classDistribution: { ...this.stats.classDistribution } };
  }
}
