import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createFakeCapture, type FakeCapture, spawnReturning } from '../test-utils/fake-capture';
import {
  buildY4m,
  buildY4mHeader,
  fillByteForFrame,
} from '../test-utils/media-fixtures';
import { buildCaptureArgs, CameraMediaSource } from './CameraMediaSource';
import { DecodeReadError, SourceOpenError } from './errors';

function framePayload(fill: number): Buffer {
  return Buffer.concat([Buffer.from('FRAME\n'), Buffer.alloc(12, fill)]);
}

describe('buildCaptureArgs', () => {
  it('captures a v4l2 device node as a Y4M pipe', () => {
    expect(
      buildCaptureArgs(2, { inputFormat: 'v4l2', width: 640, height: 480 })
    ).toEqual([
      '-f',
      'v4l2',
      '-video_size',
      '640x480',
      '-i',
      '/dev/video2',
      '-pix_fmt',
      'yuv420p',
      '-f',
      'yuv4mpegpipe',
      '-',
    ]);
  });

  it('passes the bare index to avfoundation', () => {
    const args = buildCaptureArgs(1, {
      inputFormat: 'avfoundation',
      width: 1280,
      height: 720,
    });
    expect(args.slice(0, 6)).toEqual([
      '-f',
      'avfoundation',
      '-video_size',
      '1280x720',
      '-i',
      '1',
    ]);
  });
});

describe('CameraMediaSource', () => {
  let capture: FakeCapture;
  let source: CameraMediaSource | null;

  beforeEach(() => {
    capture = createFakeCapture();
    source = null;
  });

  afterEach(async () => {
    await source?.close();
  });

  function openCamera(overrides: Parameters<typeof CameraMediaSource.open>[1] = {}) {
    return CameraMediaSource.open(0, {
      spawnCapture: spawnReturning(capture),
      warmupFrames: 0,
      openTimeoutMs: 200,
      readTimeoutMs: 200,
      ...overrides,
    });
  }

  it('opens once the stream header arrives', async () => {
    const spawnCapture = spawnReturning(capture);
    const opening = CameraMediaSource.open(3, {
      spawnCapture,
      ffmpegPath: '/opt/ffmpeg',
      warmupFrames: 0,
    });
    capture.stdout.write(buildY4mHeader({ frameCount: 0 }));
    source = await opening;

    expect(spawnCapture).toHaveBeenCalledWith(
      '/opt/ffmpeg',
      expect.arrayContaining(['/dev/video3'])
    );
    expect(source.isLive).toBe(true);
    expect(source.properties()).toEqual({
      frameRate: 25,
      totalFrameCount: 1000,
      duration: 0,
      width: 4,
      height: 2,
    });
  });

  it('waits for the next frame when none is buffered', async () => {
    const opening = openCamera();
    capture.stdout.write(buildY4mHeader({ frameCount: 0 }));
    source = await opening;

    const reading = source.readNext();
    capture.stdout.write(framePayload(42));

    const result = await reading;
    expect(result.type).toBe('frame');
    if (result.type === 'frame') {
      expect(result.frame.index).toBe(0);
      expect(result.frame.data[0]).toBe(42);
    }
  });

  it('keeps only the most recent frame by default', async () => {
    const opening = openCamera();
    capture.stdout.write(buildY4m({ frameCount: 3 }));
    source = await opening;

    const result = await source.readNext();
    expect(result.type === 'frame' && result.frame.index).toBe(2);
    expect(result.type === 'frame' && result.frame.data[0]).toBe(fillByteForFrame(2));
  });

  it('discards warm-up frames', async () => {
    const opening = openCamera({ warmupFrames: 2, bufferSize: 4 });
    capture.stdout.write(buildY4m({ frameCount: 4 }));
    source = await opening;

    const first = await source.readNext();
    const second = await source.readNext();

    expect(first.type === 'frame' && first.frame.index).toBe(0);
    expect(first.type === 'frame' && first.frame.data[0]).toBe(fillByteForFrame(2));
    expect(second.type === 'frame' && second.frame.data[0]).toBe(fillByteForFrame(3));
  });

  it('fails a read when no frame arrives in time', async () => {
    const opening = openCamera({ readTimeoutMs: 20 });
    capture.stdout.write(buildY4mHeader({ frameCount: 0 }));
    source = await opening;

    const reading = source.readNext();
    await expect(reading).rejects.toBeInstanceOf(DecodeReadError);
    await expect(reading).rejects.toThrow('No frame from camera within 20ms');
  });

  it('reports end of stream once the process exits', async () => {
    const opening = openCamera();
    capture.stdout.write(buildY4mHeader({ frameCount: 0 }));
    source = await opening;

    capture.exit(0);

    expect(await source.readNext()).toEqual({ type: 'end-of-stream' });
  });

  it('rejects open when no header arrives in time', async () => {
    await expect(openCamera({ openTimeoutMs: 20 })).rejects.toThrow(
      'Cannot open camera 0: No stream header within 20ms'
    );
    expect(capture.stop).toHaveBeenCalled();
  });

  it('rejects open when the process exits before streaming', async () => {
    const opening = openCamera();
    capture.exit(1);

    await expect(opening).rejects.toBeInstanceOf(SourceOpenError);
    await expect(opening).rejects.toThrow(
      'Cannot open camera 0: Capture process exited before streaming'
    );
  });

  it('rejects open when the output is not Y4M', async () => {
    const opening = openCamera();
    capture.stdout.write('garbage\n');

    await expect(opening).rejects.toThrow(
      'Cannot open camera 0: Invalid capture stream: Missing YUV4MPEG2 signature'
    );
  });

  it('ignores seeks and closes idempotently', async () => {
    const opening = openCamera();
    capture.stdout.write(buildY4mHeader({ frameCount: 0 }));
    const camera = await opening;

    await camera.seek();
    await camera.close();
    await camera.close();

    expect(capture.stop).toHaveBeenCalledTimes(1);
    await expect(camera.readNext()).rejects.toBeInstanceOf(DecodeReadError);
  });
});
