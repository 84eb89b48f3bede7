/**
 * CameraMediaSource - live capture through an ffmpeg child process
 *
 * ffmpeg reads the device and writes a Y4M stream to stdout, which is parsed
 * incrementally. Only the most recent frames are buffered, so a slow reader
 * always gets a fresh frame rather than a backlog.
 */

import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import {
  BehaviorSubject,
  firstValueFrom,
  from,
  race,
  Subject,
  type Subscription,
  timer,
} from 'rxjs';
import { filter, map } from 'rxjs/operators';
import type { Frame, MediaProperties, ReadResult } from '../types/media';
import { createLogger } from '../utils/logger';
import { settleWithin } from '../utils/timing';
import { type Y4mHeader, Y4mStreamParser } from '../utils/y4m';
import { DecodeReadError, describeError, SourceOpenError } from './errors';
import { type MediaSource, resolveProperties } from './MediaSource';

const log = createLogger({ component: 'CameraMediaSource' });

export type CaptureInputFormat = 'v4l2' | 'avfoundation';

/**
 * A running capture process
 */
export interface CaptureHandle {
  /** Y4M byte stream */
  readonly stdout: Readable;
  stop(): void;
  /** Resolves with the exit code once the process is gone */
  readonly exited: Promise<number | null>;
}

export type SpawnCapture = (command: string, args: string[]) => CaptureHandle;

export interface CameraOptions {
  ffmpegPath: string;
  inputFormat: CaptureInputFormat;
  width: number;
  height: number;
  /** How long open() waits for the stream header */
  openTimeoutMs: number;
  /** How long readNext() waits for a frame before failing */
  readTimeoutMs: number;
  /** Frames discarded after the header while the device settles */
  warmupFrames: number;
  /** Frames kept for the reader; older ones are dropped */
  bufferSize: number;
  spawnCapture: SpawnCapture;
}

export const spawnFfmpeg: SpawnCapture = (command, args) => {
  const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'ignore'] });
  const exited = new Promise<number | null>((resolve) => {
    child.once('exit', (code) => resolve(code));
    child.once('error', (error) => {
      log.error(`Failed to run ${command}`, error);
      resolve(null);
    });
  });

  return {
    stdout: child.stdout,
    stop: () => {
      child.kill('SIGTERM');
    },
    exited,
  };
};

export const DEFAULT_CAMERA_OPTIONS: CameraOptions = {
  ffmpegPath: 'ffmpeg',
  inputFormat: 'v4l2',
  width: 640,
  height: 480,
  openTimeoutMs: 5000,
  readTimeoutMs: 2000,
  warmupFrames: 3,
  bufferSize: 1,
  spawnCapture: spawnFfmpeg,
};

const CLOSE_WAIT_MS = 1000;

/**
 * ffmpeg arguments that capture `deviceIndex` as a Y4M stream on stdout
 */
export function buildCaptureArgs(
  deviceIndex: number,
  options: Pick<CameraOptions, 'inputFormat' | 'width' | 'height'>
): string[] {
  const device =
    options.inputFormat === 'v4l2' ? `/dev/video${deviceIndex}` : String(deviceIndex);

  return [
    '-f',
    options.inputFormat,
    '-video_size',
    `${options.width}x${options.height}`,
    '-i',
    device,
    '-pix_fmt',
    'yuv420p',
    '-f',
    'yuv4mpegpipe',
    '-',
  ];
}

type HeaderOutcome = 'ready' | 'ended' | 'timeout';

export class CameraMediaSource implements MediaSource {
  readonly type = 'camera' as const;
  readonly isLive = true;

  private readonly header$ = new BehaviorSubject<Y4mHeader | null>(null);
  private readonly wake$ = new Subject<void>();
  private readonly parser: Y4mStreamParser;
  private readonly exitSubscription: Subscription;

  private buffer: Frame[] = [];
  private nextIndex = 0;
  private warmupRemaining: number;
  private failure: DecodeReadError | null = null;
  private ended = false;
  private closed = false;

  private constructor(
    private readonly capture: CaptureHandle,
    private readonly settings: CameraOptions
  ) {
    this.warmupRemaining = settings.warmupFrames;
    this.parser = new Y4mStreamParser(
      (header) => this.header$.next(header),
      (payload) => this.onFrame(payload)
    );

    capture.stdout.on('data', (chunk: Buffer) => this.consume(chunk));
    capture.stdout.on('error', (error: Error) => {
      this.fail(new DecodeReadError(`Capture stream failed: ${error.message}`, { cause: error }));
    });
    capture.stdout.once('end', () => this.finish());

    this.exitSubscription = from(capture.exited).subscribe((code) => {
      log.debug(`Capture process exited with code ${code}`, { action: 'exit' });
      this.finish();
    });
  }

  /**
   * Start capturing and wait for the stream header
   */
  static async open(
    deviceIndex: number,
    options: Partial<CameraOptions> = {}
  ): Promise<CameraMediaSource> {
    const settings = { ...DEFAULT_CAMERA_OPTIONS, ...options };
    const identifier = { kind: 'camera', deviceIndex } as const;
    const args = buildCaptureArgs(deviceIndex, settings);

    let capture: CaptureHandle;
    try {
      capture = settings.spawnCapture(settings.ffmpegPath, args);
    } catch (error) {
      throw new SourceOpenError(identifier, describeError(error), { cause: error });
    }

    log.debug(`${settings.ffmpegPath} ${args.join(' ')}`, { action: 'open' });
    const source = new CameraMediaSource(capture, settings);
    const outcome = await source.waitForHeader();
    if (outcome === 'ready') {
      return source;
    }

    const reason =
      outcome === 'timeout'
        ? `No stream header within ${settings.openTimeoutMs}ms`
        : (source.failure?.message ?? 'Capture process exited before streaming');
    await source.close();
    throw new SourceOpenError(identifier, reason);
  }

  properties(): MediaProperties {
    const header = this.header$.getValue();
    return resolveProperties({
      frameRate: header?.frameRate ?? null,
      totalFrameCount: null,
      width: header?.width ?? this.settings.width,
      height: header?.height ?? this.settings.height,
    });
  }

  /**
   * Next buffered frame, waiting up to `readTimeoutMs` for one to arrive.
   * A stream failure is reported once, after which the source is at its end.
   */
  async readNext(): Promise<ReadResult> {
    for (;;) {
      if (this.closed) {
        throw new DecodeReadError('Source is closed');
      }

      const frame = this.buffer.shift();
      if (frame) {
        return { type: 'frame', frame };
      }

      if (this.failure) {
        const failure = this.failure;
        this.failure = null;
        throw failure;
      }
      if (this.ended) {
        return { type: 'end-of-stream' };
      }

      const woke = await firstValueFrom(
        race(
          this.wake$.pipe(map(() => true)),
          timer(this.settings.readTimeoutMs).pipe(map(() => false))
        ),
        { defaultValue: true }
      );
      if (!woke) {
        throw new DecodeReadError(
          `No frame from camera within ${this.settings.readTimeoutMs}ms`
        );
      }
    }
  }

  async seek(): Promise<void> {
    // Live capture cannot be repositioned
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.buffer = [];

    this.capture.stdout.removeAllListeners('data');
    this.capture.stop();
    this.wake$.next();
    this.wake$.complete();
    this.header$.complete();

    if ((await settleWithin(this.capture.exited, CLOSE_WAIT_MS)) === 'timeout') {
      log.warn(`Capture process still running ${CLOSE_WAIT_MS}ms after stop`);
    }
    this.exitSubscription.unsubscribe();
  }

  private waitForHeader(): Promise<HeaderOutcome> {
    if (this.ended) return Promise.resolve('ended');

    return firstValueFrom(
      race(
        this.header$.pipe(
          filter((header) => header !== null),
          map((): HeaderOutcome => 'ready')
        ),
        this.wake$.pipe(
          filter(() => this.ended),
          map((): HeaderOutcome => 'ended')
        ),
        timer(this.settings.openTimeoutMs).pipe(map((): HeaderOutcome => 'timeout'))
      ),
      { defaultValue: 'ended' }
    );
  }

  private consume(chunk: Buffer): void {
    if (this.failure || this.ended || this.closed) return;
    try {
      this.parser.push(chunk);
    } catch (error) {
      this.fail(
        new DecodeReadError(`Invalid capture stream: ${describeError(error)}`, {
          cause: error,
        })
      );
    }
  }

  private onFrame(payload: Buffer): void {
    const header = this.parser.getHeader();
    if (!header) return;

    if (this.warmupRemaining > 0) {
      this.warmupRemaining--;
      return;
    }

    const index = this.nextIndex++;
    this.buffer.push({
      index,
      timestamp: index / this.properties().frameRate,
      width: header.width,
      height: header.height,
      format: header.format,
      colorRange: header.colorRange,
      data: payload,
    });
    while (this.buffer.length > Math.max(1, this.settings.bufferSize)) {
      this.buffer.shift();
    }
    this.wake$.next();
  }

  private fail(error: DecodeReadError): void {
    if (this.failure || this.ended) return;
    log.error('Capture stream failed', error);
    this.failure = error;
    this.capture.stop();
    this.finish();
  }

  private finish(): void {
    if (this.ended) return;
    this.ended = true;
    this.wake$.next();
  }
}
