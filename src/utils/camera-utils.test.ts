/**
 * @fileoverview Tests for MJPEG helpers
 */

import { describe, it, expect } from '@jest/globals';
import { Writable } from 'stream';
import type { CameraFrame } from '../types/camera';
import { BroadcastTopic } from './BroadcastTopic';
import {
  buildCameraStreamUrl,
  extractBoundary,
  formatMultipartPart,
  MjpegStreamParser,
  writeMultipartFrames
} from './camera-utils';

const JPEG_A = Buffer.from([0xff, 0xd8, 0x01, 0x02, 0xff, 0xd9]);
const JPEG_B = Buffer.from([0xff, 0xd8, 0x03, 0xff, 0xd9]);

function part(data: Buffer, withLength = true): Buffer {
  const head = '--boundarydonotcross\r\nContent-Type: image/jpeg\r\n' +
    (withLength ? `Content-Length: ${data.length}\r\n` : '') + '\r\n';
  return Buffer.concat([Buffer.from(head), data, Buffer.from('\r\n')]);
}

describe('buildCameraStreamUrl', () => {
  it('should default to the stream action on port 8080', () => {
    expect(buildCameraStreamUrl('192.168.1.20')).toBe('http://192.168.1.20:8080/?action=stream');
  });
});

describe('extractBoundary', () => {
  it('should read plain and quoted boundaries', () => {
    expect(extractBoundary('multipart/x-mixed-replace;boundary=frame')).toBe('frame');
    expect(extractBoundary('multipart/x-mixed-replace; boundary="abc"')).toBe('abc');
  });

  it('should strip leading dashes', () => {
    expect(extractBoundary('multipart/x-mixed-replace;boundary=--myboundary')).toBe('myboundary');
  });

  it('should fall back to the default boundary', () => {
    expect(extractBoundary(undefined)).toBe('boundarydonotcross');
    expect(extractBoundary('image/jpeg')).toBe('boundarydonotcross');
  });
});

describe('MjpegStreamParser', () => {
  it('should cut frames framed by content-length', () => {
    const parser = new MjpegStreamParser();
    const frames = parser.push(Buffer.concat([part(JPEG_A), part(JPEG_B)]));

    expect(frames.map(frame => frame.data)).toEqual([JPEG_A, JPEG_B]);
    expect(frames[0].headers['content-length']).toBe('6');
    expect(frames[0].headers['content-type']).toBe('image/jpeg');
  });

  it('should reassemble frames split across chunks', () => {
    const parser = new MjpegStreamParser();
    const stream = Buffer.concat([part(JPEG_A), part(JPEG_B)]);
    const frames: CameraFrame[] = [];
    for (let offset = 0; offset < stream.length; offset += 7) {
      frames.push(...parser.push(stream.subarray(offset, offset + 7)));
    }

    expect(frames.map(frame => frame.data)).toEqual([JPEG_A, JPEG_B]);
  });

  it('should frame by the next boundary when content-length is absent', () => {
    const parser = new MjpegStreamParser();

    expect(parser.push(part(JPEG_A, false))).toEqual([]);
    const frames = parser.push(part(JPEG_B, false));

    expect(frames).toHaveLength(1);
    expect(frames[0].data).toEqual(JPEG_A);
    expect(frames[0].headers['content-length']).toBe('6');
  });
});

describe('formatMultipartPart', () => {
  it('should produce a part the parser reads back', () => {
    const parser = new MjpegStreamParser();
    const frame = { data: JPEG_A, headers: { 'content-type': 'image/jpeg' }, receivedAt: new Date(0) };

    const [parsed] = parser.push(formatMultipartPart(frame));

    expect(parsed.data).toEqual(JPEG_A);
  });
});

describe('writeMultipartFrames', () => {
  const settle = (): Promise<void> => new Promise(resolve => setImmediate(resolve));
  const frameOf = (data: Buffer): CameraFrame => ({
    data,
    headers: { 'content-type': 'image/jpeg', 'content-length': String(data.length) },
    receivedAt: new Date()
  });

  it('should write each frame as a part', async () => {
    const topic = new BroadcastTopic<CameraFrame>(4);
    const receiver = topic.subscribe();
    const written: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        written.push(chunk);
        callback();
      }
    });

    const done = writeMultipartFrames(receiver, sink, 'testboundary');
    topic.publish(frameOf(JPEG_A));
    await settle();
    receiver.close();
    await done;

    expect(written).toEqual([formatMultipartPart(frameOf(JPEG_A), 'testboundary')]);
  });

  it('should stop pulling frames while the sink is backed up', async () => {
    const topic = new BroadcastTopic<CameraFrame>(2);
    const receiver = topic.subscribe();
    const written: Buffer[] = [];
    // Never completes a write, so the sink stays full
    const sink = new Writable({
      highWaterMark: 1,
      write(chunk: Buffer) {
        written.push(chunk);
      }
    });

    const done = writeMultipartFrames(receiver, sink);
    await settle();
    topic.publish(frameOf(JPEG_A));
    await settle();
    for (let i = 0; i < 5; i++) {
      topic.publish(frameOf(JPEG_B));
      await settle();
    }

    expect(written).toHaveLength(1);
    expect(receiver.droppedCount).toBe(3);

    sink.destroy();
    await done;
    expect(topic.receiverCount).toBe(0);
  });
});
