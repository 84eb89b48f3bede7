import { describe, expect, it, vi } from 'vitest';
import { buildY4m, fillByteForFrame } from '../test-utils/media-fixtures';
import { parseY4mHeader, y4mFrameSize, Y4mStreamParser } from './y4m';

describe('parseY4mHeader', () => {
  it('parses dimensions, rate and colour space', () => {
    const header = parseY4mHeader(
      'YUV4MPEG2 W640 H480 F30000:1001 Ip A1:1 C420jpeg XYSCSS=420JPEG'
    );

    expect(header.width).toBe(640);
    expect(header.height).toBe(480);
    expect(header.frameRate).toBeCloseTo(29.97, 2);
    expect(header.format).toBe('yuv420p');
    expect(header.colorRange).toBeUndefined();
  });

  it('defaults to 4:2:0 when C is absent', () => {
    expect(parseY4mHeader('YUV4MPEG2 W2 H2 F25:1').format).toBe('yuv420p');
  });

  it('maps 444 and mono', () => {
    expect(parseY4mHeader('YUV4MPEG2 W2 H2 C444').format).toBe('yuv444p');
    expect(parseY4mHeader('YUV4MPEG2 W2 H2 Cmono').format).toBe('gray8');
  });

  it('reports a missing or zero rate as null', () => {
    expect(parseY4mHeader('YUV4MPEG2 W2 H2').frameRate).toBeNull();
    expect(parseY4mHeader('YUV4MPEG2 W2 H2 F0:0').frameRate).toBeNull();
  });

  it('reads the colour range extension', () => {
    expect(
      parseY4mHeader('YUV4MPEG2 W2 H2 XCOLORRANGE=LIMITED').colorRange
    ).toBe('limited');
    expect(parseY4mHeader('YUV4MPEG2 W2 H2 XCOLORRANGE=FULL').colorRange).toBe(
      'full'
    );
  });

  it('rejects other signatures', () => {
    expect(() => parseY4mHeader('P6 2 2 255')).toThrow(
      'Missing YUV4MPEG2 signature'
    );
  });

  it('rejects missing dimensions', () => {
    expect(() => parseY4mHeader('YUV4MPEG2 W2 F25:1')).toThrow(
      'Y4M header is missing W or H'
    );
  });

  it('rejects unsupported colour spaces', () => {
    expect(() => parseY4mHeader('YUV4MPEG2 W2 H2 C422')).toThrow(
      'Unsupported Y4M colour space: 422'
    );
  });
});

describe('y4mFrameSize', () => {
  it('sizes a 4x2 4:2:0 frame', () => {
    expect(y4mFrameSize(parseY4mHeader('YUV4MPEG2 W4 H2'))).toBe(12);
  });
});

describe('Y4mStreamParser', () => {
  it('emits the header and every frame', () => {
    const onHeader = vi.fn();
    const payloads: Buffer[] = [];
    const parser = new Y4mStreamParser(onHeader, (p) => payloads.push(p));

    parser.push(buildY4m({ frameCount: 3 }));

    expect(onHeader).toHaveBeenCalledTimes(1);
    expect(payloads).toHaveLength(3);
    expect(payloads[2]).toEqual(Buffer.alloc(12, fillByteForFrame(2)));
  });

  it('reassembles frames split across chunks', () => {
    const payloads: Buffer[] = [];
    const parser = new Y4mStreamParser(
      () => {},
      (p) => payloads.push(p)
    );
    const stream = buildY4m({ frameCount: 2 });

    for (let i = 0; i < stream.length; i += 5) {
      parser.push(stream.subarray(i, i + 5));
    }

    expect(payloads).toHaveLength(2);
    expect(payloads[0]).toEqual(Buffer.alloc(12, fillByteForFrame(0)));
    expect(payloads[1]).toEqual(Buffer.alloc(12, fillByteForFrame(1)));
  });

  it('accepts frame lines with parameters', () => {
    const payloads: Buffer[] = [];
    const parser = new Y4mStreamParser(
      () => {},
      (p) => payloads.push(p)
    );

    parser.push(Buffer.from('YUV4MPEG2 W2 H1 Cmono\nFRAME Ip\nab', 'ascii'));

    expect(payloads).toEqual([Buffer.from('ab', 'ascii')]);
  });

  it('throws when a frame marker is missing', () => {
    const parser = new Y4mStreamParser(
      () => {},
      () => {}
    );

    expect(() =>
      parser.push(Buffer.from('YUV4MPEG2 W2 H1 Cmono\nJUNK\nab', 'ascii'))
    ).toThrow('Expected FRAME marker, got "JUNK"');
  });
});
