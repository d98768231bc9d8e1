/**
 * @fileoverview Type definitions for printer camera streaming
 *
 * Printers publish an MJPEG stream (`multipart/x-mixed-replace`) over plain HTTP. The
 * camera multiplexer keeps at most one upstream connection per printer and fans frames
 * out to any number of local viewers.
 */

/**
 * One complete JPEG image cut out of the multipart stream
 */
export interface CameraFrame {
  /** Raw JPEG bytes */
  readonly data: Buffer;
  /** Part headers, names lower-cased; always carries content-length and content-type */
  readonly headers: Readonly<Record<string, string>>;
  readonly receivedAt: Date;
}

/**
 * Where and how to reach a printer's camera
 */
export interface CameraMultiplexerOptions {
  readonly printerId: string;
  readonly host: string;
  /** HTTP port of the camera server */
  readonly port?: number;
  /** Request path of the MJPEG stream */
  readonly path?: string;
  /** Frames buffered per viewer before the oldest is dropped */
  readonly queueCapacity?: number;
  /** An upstream that delivers no frame for this long is ended */
  readonly frameTimeoutMs?: number;
}

/**
 * Point-in-time camera state, safe to serialize
 */
export interface CameraStatus {
  readonly printerId: string;
  readonly streamUrl: string;
  /** True while an upstream connection is open or being opened */
  readonly streaming: boolean;
  readonly subscriberCount: number;
  readonly framesReceived: number;
  readonly lastFrameAt: string | null;
  readonly lastError: string | null;
}

export const DEFAULT_CAMERA_PORT = 8080;
export const DEFAULT_CAMERA_PATH = '/?action=stream';
export const DEFAULT_MJPEG_BOUNDARY = 'boundarydonotcross';
export const DEFAULT_CAMERA_QUEUE_CAPACITY = 32;
export const DEFAULT_SNAPSHOT_TIMEOUT_MS = 10000;
export const DEFAULT_FRAME_TIMEOUT_MS = 15000;
