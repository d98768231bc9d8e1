/**
 * @fileoverview Shares one upstream MJPEG connection per printer among any number of viewers.
 *
 * The printer's camera server accepts a single client, so every viewer, snapshot and
 * notification goes through this multiplexer:
 * - subscribe() attaches a receiver to a bounded broadcast topic and starts the upstream
 *   fetch only when none is running
 * - every parsed frame overwrites the single-slot last-frame cache, then is published
 * - a publish that reaches nobody ends the upstream fetch; the next subscribe() opens
 *   a fresh one
 * - an upstream failure fails the receivers attached at that moment with
 *   CAMERA_UNAVAILABLE and ends the fetch; so does an upstream that sends no frame
 *   for `frameTimeoutMs`
 *
 * There is no reconnection loop: a new subscription is the retry.
 */

import * as http from 'http';
import { BroadcastTopic, TopicReceiver } from '../utils/BroadcastTopic';
import { buildCameraStreamUrl, extractBoundary, MjpegStreamParser } from '../utils/camera-utils';
import { AppError, cameraUnavailableError } from '../utils/error.utils';
import { logInfo, logVerbose, logWarning } from '../utils/logging';
import type { CameraFrame, CameraMultiplexerOptions, CameraStatus } from '../types/camera';
import {
  DEFAULT_CAMERA_PATH,
  DEFAULT_CAMERA_PORT,
  DEFAULT_CAMERA_QUEUE_CAPACITY,
  DEFAULT_FRAME_TIMEOUT_MS,
  DEFAULT_SNAPSHOT_TIMEOUT_MS
} from '../types/camera';

const LOG_NAMESPACE = 'CameraMultiplexer';

interface UpstreamTask {
  readonly request: http.ClientRequest;
  frameTimer: NodeJS.Timeout | null;
}

export class CameraMultiplexer {
  private readonly printerId: string;
  private readonly host: string;
  private readonly port: number;
  private readonly path: string;
  private readonly frameTimeoutMs: number;
  private readonly topic: BroadcastTopic<CameraFrame>;

  private upstream: UpstreamTask | null = null;
  private lastFrame: CameraFrame | null = null;
  private lastError: string | null = null;
  private framesReceived = 0;
  private upstreamConnections = 0;

  constructor(options: CameraMultiplexerOptions) {
    this.printerId = options.printerId;
    this.host = options.host;
    this.port = options.port ?? DEFAULT_CAMERA_PORT;
    this.path = options.path ?? DEFAULT_CAMERA_PATH;
    this.frameTimeoutMs = options.frameTimeoutMs ?? DEFAULT_FRAME_TIMEOUT_MS;
    this.topic = new BroadcastTopic<CameraFrame>(options.queueCapacity ?? DEFAULT_CAMERA_QUEUE_CAPACITY);
  }

  get streamUrl(): string {
    return buildCameraStreamUrl(this.host, this.port, this.path);
  }

  // ============================================================================
  // PUBLIC API
  // ============================================================================

  /**
   * Attach a new viewer, starting the upstream fetch if none is running
   */
  subscribe(): TopicReceiver<CameraFrame> {
    const receiver = this.topic.subscribe();
    if (!this.upstream) {
      this.startUpstream();
    }
    return receiver;
  }

  /**
   * Wait for the next live frame
   *
   * @throws AppError CAMERA_UNAVAILABLE when the upstream fails, TIMEOUT when no frame
   *   arrives within `timeoutMs`
   */
  async snapshot(timeoutMs: number = DEFAULT_SNAPSHOT_TIMEOUT_MS): Promise<CameraFrame> {
    const receiver = this.subscribe();
    try {
      const frame = await receiver.recv(timeoutMs);
      if (frame === null) {
        throw cameraUnavailableError('Camera stream closed before a frame arrived', {
          printerId: this.printerId
        });
      }
      return frame;
    } finally {
      receiver.close();
    }
  }

  /**
   * Most recent frame seen, possibly stale. No I/O.
   */
  getLastFrame(): CameraFrame | null {
    return this.lastFrame;
  }

  getStatus(): CameraStatus {
    return {
      printerId: this.printerId,
      streamUrl: this.streamUrl,
      streaming: this.upstream !== null,
      subscriberCount: this.topic.receiverCount,
      framesReceived: this.framesReceived,
      lastFrameAt: this.lastFrame ? this.lastFrame.receivedAt.toISOString() : null,
      lastError: this.lastError
    };
  }

  /** Number of upstream connections opened so far */
  getUpstreamConnectionCount(): number {
    return this.upstreamConnections;
  }

  /**
   * Abort the upstream fetch and close every viewer
   */
  stop(): void {
    if (this.upstream) {
      this.endUpstream(this.upstream, null);
    }
    this.topic.close();
  }

  // ============================================================================
  // UPSTREAM
  // ============================================================================

  private startUpstream(): void {
    const streamUrl = this.streamUrl;
    logInfo(LOG_NAMESPACE, `Opening camera stream for ${this.printerId} from ${streamUrl}`);
    this.upstreamConnections++;

    const request = http.get({
      hostname: this.host,
      port: this.port,
      path: this.path,
      agent: false,
      headers: { 'Accept': '*/*' }
    }, (response) => {
      if (response.statusCode !== 200) {
        response.resume();
        this.endUpstream(task, cameraUnavailableError(
          `Camera returned status code: ${response.statusCode ?? 'none'}`,
          { printerId: this.printerId, streamUrl }
        ));
        return;
      }

      this.lastError = null;
      const parser = new MjpegStreamParser(extractBoundary(response.headers['content-type']));

      response.on('data', (chunk: Buffer) => {
        for (const frame of parser.push(chunk)) {
          if (!this.publishFrame(task, frame)) {
            return;
          }
        }
      });

      response.on('end', () => {
        this.endUpstream(task, cameraUnavailableError('Camera stream ended', {
          printerId: this.printerId,
          streamUrl
        }));
      });

      response.on('error', (error: Error) => {
        this.endUpstream(task, cameraUnavailableError('Camera stream failed', {
          printerId: this.printerId,
          streamUrl
        }, error));
      });
    });

    const task: UpstreamTask = { request, frameTimer: null };

    request.on('error', (error: Error) => {
      this.endUpstream(task, cameraUnavailableError(`Failed to connect to camera at ${streamUrl}`, {
        printerId: this.printerId,
        streamUrl
      }, error));
    });

    this.upstream = task;
    this.armFrameTimer(task);
  }

  /**
   * (Re)start the wait for the upstream's next frame
   */
  private armFrameTimer(task: UpstreamTask): void {
    if (task.frameTimer) {
      clearTimeout(task.frameTimer);
    }
    task.frameTimer = setTimeout(() => {
      this.endUpstream(task, cameraUnavailableError(
        `No camera frame received within ${this.frameTimeoutMs}ms`,
        { printerId: this.printerId, streamUrl: this.streamUrl }
      ));
    }, this.frameTimeoutMs);
  }

  /**
   * @returns false once the task has ended and parsing should stop
   */
  private publishFrame(task: UpstreamTask, frame: CameraFrame): boolean {
    if (this.upstream !== task) {
      return false;
    }

    this.lastFrame = frame;
    this.framesReceived++;
    this.armFrameTimer(task);

    if (this.topic.publish(frame) === 0) {
      logVerbose(LOG_NAMESPACE, `No viewers left for ${this.printerId}, closing camera stream`);
      this.endUpstream(task, null);
      return false;
    }
    return true;
  }

  private endUpstream(task: UpstreamTask, error: AppError | null): void {
    if (this.upstream !== task) {
      return;
    }
    this.upstream = null;
    if (task.frameTimer) {
      clearTimeout(task.frameTimer);
      task.frameTimer = null;
    }
    task.request.destroy();

    if (error) {
      this.lastError = error.message;
      const failed = this.topic.failReceivers(error);
      logWarning(LOG_NAMESPACE, `${error.message} (${this.printerId}, ${failed} viewer(s) dropped)`);
    }
  }
}
