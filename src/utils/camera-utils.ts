/**
 * @fileoverview MJPEG stream helpers: camera URL building, boundary extraction, and an
 * incremental multipart parser that turns arbitrary upstream chunks into whole frames.
 *
 * Parts are framed by their Content-Length header when present. Without one, a part
 * ends at the next boundary delimiter, minus the CRLF that precedes it.
 */

import type { Writable } from 'stream';
import type { CameraFrame } from '../types/camera';
import { DEFAULT_CAMERA_PATH, DEFAULT_CAMERA_PORT, DEFAULT_MJPEG_BOUNDARY } from '../types/camera';

const HEADER_TERMINATOR = Buffer.from('\r\n\r\n');
const BOUNDARY_PATTERN = /boundary=(?:"([^"]+)"|([^;\s]+))/i;

/** Parser buffer ceiling; anything larger without a complete part is discarded */
export const MAX_PART_BYTES = 8 * 1024 * 1024;

/**
 * Build the printer's MJPEG stream URL
 */
export function buildCameraStreamUrl(
  host: string,
  port: number = DEFAULT_CAMERA_PORT,
  path: string = DEFAULT_CAMERA_PATH
): string {
  return `http://${host}:${port}${path}`;
}

/**
 * Read the multipart boundary out of a Content-Type header value
 */
export function extractBoundary(contentType: string | undefined): string {
  const match = contentType ? BOUNDARY_PATTERN.exec(contentType) : null;
  const boundary = match ? (match[1] ?? match[2]) : undefined;
  if (!boundary) {
    return DEFAULT_MJPEG_BOUNDARY;
  }
  // some servers repeat the leading dashes in the header
  return boundary.startsWith('--') ? boundary.slice(2) : boundary;
}

/**
 * Format one frame as a multipart part for re-broadcast to a viewer
 */
export function formatMultipartPart(frame: CameraFrame, boundary: string = DEFAULT_MJPEG_BOUNDARY): Buffer {
  const head = `--${boundary}\r\nContent-Type: ${frame.headers['content-type'] ?? 'image/jpeg'}\r\n` +
    `Content-Length: ${frame.data.length}\r\n\r\n`;
  return Buffer.concat([Buffer.from(head, 'latin1'), frame.data, Buffer.from('\r\n')]);
}

/**
 * Write frames to a viewer as multipart parts until the frames end or the viewer goes
 * away. While the viewer's buffer is full no frame is pulled, so a slow viewer falls
 * behind in its bounded receiver queue instead of in the socket buffer.
 */
export async function writeMultipartFrames(
  frames: AsyncIterable<CameraFrame>,
  sink: Writable,
  boundary: string = DEFAULT_MJPEG_BOUNDARY
): Promise<void> {
  for await (const frame of frames) {
    if (sink.destroyed) {
      return;
    }
    if (!sink.write(formatMultipartPart(frame, boundary))) {
      await waitForDrain(sink);
    }
  }
}

function waitForDrain(sink: Writable): Promise<void> {
  if (sink.destroyed) {
    return Promise.resolve();
  }
  return new Promise<void>(resolve => {
    const done = (): void => {
      sink.off('drain', done);
      sink.off('close', done);
      resolve();
    };
    sink.once('drain', done);
    sink.once('close', done);
  });
}

function parsePartHeaders(text: string): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of text.split('\r\n')) {
    const separator = line.indexOf(':');
    if (separator <= 0) continue;
    headers[line.slice(0, separator).trim().toLowerCase()] = line.slice(separator + 1).trim();
  }
  return headers;
}

/**
 * Incremental `multipart/x-mixed-replace` parser
 */
export class MjpegStreamParser {
  private readonly delimiter: Buffer;
  private buffer: Buffer = Buffer.alloc(0);

  constructor(boundary: string = DEFAULT_MJPEG_BOUNDARY) {
    this.delimiter = Buffer.from(`--${boundary}`, 'latin1');
  }

  /**
   * Feed one chunk and collect every frame it completes
   */
  push(chunk: Buffer): CameraFrame[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: CameraFrame[] = [];

    let frame = this.nextFrame();
    while (frame) {
      frames.push(frame);
      frame = this.nextFrame();
    }

    if (this.buffer.length > MAX_PART_BYTES) {
      this.buffer = Buffer.alloc(0);
    }
    return frames;
  }

  private nextFrame(): CameraFrame | null {
    const start = this.buffer.indexOf(this.delimiter);
    if (start === -1) {
      return null;
    }

    const headerStart = start + this.delimiter.length;
    const headerEnd = this.buffer.indexOf(HEADER_TERMINATOR, headerStart);
    if (headerEnd === -1) {
      return null;
    }

    // first line is the rest of the delimiter line
    const headerLines = this.buffer.subarray(headerStart, headerEnd).toString('latin1');
    const headers = parsePartHeaders(headerLines);
    const bodyStart = headerEnd + HEADER_TERMINATOR.length;

    let body: Buffer;
    const declaredLength = Number(headers['content-length']);
    if (headers['content-length'] !== undefined && Number.isInteger(declaredLength) && declaredLength >= 0) {
      if (this.buffer.length < bodyStart + declaredLength) {
        return null;
      }
      body = Buffer.from(this.buffer.subarray(bodyStart, bodyStart + declaredLength));
      this.buffer = this.buffer.subarray(bodyStart + declaredLength);
    } else {
      const next = this.buffer.indexOf(this.delimiter, bodyStart);
      if (next === -1) {
        return null;
      }
      let bodyEnd = next;
      if (bodyEnd - 2 >= bodyStart && this.buffer[bodyEnd - 2] === 0x0d && this.buffer[bodyEnd - 1] === 0x0a) {
        bodyEnd -= 2;
      }
      body = Buffer.from(this.buffer.subarray(bodyStart, bodyEnd));
      this.buffer = this.buffer.subarray(next);
    }

    return {
      data: body,
      headers: {
        ...headers,
        'content-type': headers['content-type'] ?? 'image/jpeg',
        'content-length': String(body.length)
      },
      receivedAt: new Date()
    };
  }
}
