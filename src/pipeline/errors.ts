/**
 * Pipeline error taxonomy.
 *
 * None of these are fatal to the host process: the loops turn them into
 * status or error events and either keep running or stop cleanly.
 */

import type { SourceIdentifier } from '../types/media';

export type PipelineErrorKind =
  | 'source-open'
  | 'decode-read'
  | 'inference-call'
  | 'resource-release-timeout'
  | 'configuration';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The file or device could not be opened
 */
export class SourceOpenError extends PipelineError {
  readonly kind = 'source-open' as const;

  constructor(
    readonly identifier: SourceIdentifier,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot open ${describeSource(identifier)}: ${reason}`, options);
  }
}

/**
 * A single read from an open source failed
 */
export class DecodeReadError extends PipelineError {
  readonly kind = 'decode-read' as const;
}

/**
 * The inference collaborator threw or returned an unusable result
 */
export class InferenceCallError extends PipelineError {
  readonly kind = 'inference-call' as const;

  constructor(
    readonly frameIndex: number,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Inference failed on frame ${frameIndex}: ${reason}`, options);
  }
}

/**
 * A loop did not exit within its join bound; resources were released anyway
 */
export class ResourceReleaseTimeout extends PipelineError {
  readonly kind = 'resource-release-timeout' as const;

  constructor(
    readonly component: string,
    readonly timeoutMs: number
  ) {
    super(`${component} did not stop within ${timeoutMs}ms`);
  }
}

/**
 * Settings that cannot be used, e.g. an inference task nothing is registered for
 */
export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration' as const;
}

/**
 * Human-readable name of a source
 */
export function describeSource(identifier: SourceIdentifier): string {
  return identifier.kind === 'file'
    ? `file ${identifier.path}`
    : `camera ${identifier.deviceIndex}`;
}

/**
 * Extract a message from anything that was thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
