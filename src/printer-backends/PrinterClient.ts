/**
 * @fileoverview Client for one printer: serialized TCP requests, cached identity and
 * last-known online state, plus the printer's camera multiplexer.
 *
 * Every request opens a fresh TCP session, sends the control handshake, sends the real
 * command and closes the session. The printer accepts one session at a time, so all
 * requests for a printer run under its own Mutex; different printers never wait on
 * each other.
 *
 * Identity policy: the M115 identity is fetched until the first success and then cached
 * for the lifetime of the process. A failed fetch is logged and retried on the next
 * access.
 */

import { Mutex } from '../utils/Mutex';
import {
  decodeResponse,
  encodeRequest,
  HANDSHAKE_REQUEST,
  unwrapDecodeResult,
  type PrinterHeadPosition,
  type PrinterIdentity,
  type PrinterProgress,
  type PrinterRequest,
  type PrinterResponseMap,
  type PrinterStatus,
  type PrinterTemperatures
} from '../protocol';
import { CameraMultiplexer } from '../services/CameraMultiplexer';
import { ErrorCode, hasErrorCode, offlineError, toError } from '../utils/error.utils';
import { logVerbose, logWarning } from '../utils/logging';
import {
  DEFAULT_PRINTER_PORT,
  DEFAULT_READ_TIMEOUT_MS,
  DEFAULT_WRITE_TIMEOUT_MS,
  TcpPrinterSession
} from './TcpPrinterSession';
import { DEFAULT_CAMERA_PORT } from '../types/camera';
import type { PrinterAddress, PrinterSummary } from '../types/printer';

const LOG_NAMESPACE = 'PrinterClient';

export interface PrinterClientOptions {
  readonly writeTimeoutMs?: number;
  readonly readTimeoutMs?: number;
  /** Frames buffered per camera viewer */
  readonly cameraQueueCapacity?: number;
}

/**
 * Fill in default ports for a configured address
 */
export function resolvePrinterAddress(address: { host: string; port?: number; cameraPort?: number }): PrinterAddress {
  return {
    host: address.host,
    port: address.port ?? DEFAULT_PRINTER_PORT,
    cameraPort: address.cameraPort ?? DEFAULT_CAMERA_PORT
  };
}

export class PrinterClient {
  private readonly lock = new Mutex();
  private readonly camera: CameraMultiplexer;
  private readonly writeTimeoutMs: number;
  private readonly readTimeoutMs: number;

  private identity: PrinterIdentity | null = null;
  private identityRequest: Promise<PrinterIdentity | null> | null = null;
  private online = false;
  private currentFile: string | null = null;

  constructor(
    public readonly id: string,
    public readonly address: PrinterAddress,
    options: PrinterClientOptions = {}
  ) {
    this.writeTimeoutMs = options.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.camera = new CameraMultiplexer({
      printerId: id,
      host: address.host,
      port: address.cameraPort,
      queueCapacity: options.cameraQueueCapacity
    });
  }

  // ============================================================================
  // REQUESTS
  // ============================================================================

  /**
   * Send one request under this printer's lock and decode the reply
   *
   * @throws AppError PRINTER_CONNECTION, PRINTER_TIMEOUT or PROTOCOL_MALFORMED_RESPONSE
   */
  async sendRequest<R extends PrinterRequest>(request: R): Promise<PrinterResponseMap[R['kind']]> {
    return await this.lock.runExclusive(() => this.exchange(request));
  }

  private async exchange<R extends PrinterRequest>(request: R): Promise<PrinterResponseMap[R['kind']]> {
    const session = await TcpPrinterSession.open({
      host: this.address.host,
      port: this.address.port,
      writeTimeoutMs: this.writeTimeoutMs,
      readTimeoutMs: this.readTimeoutMs
    });

    try {
      await session.exchange(encodeRequest(HANDSHAKE_REQUEST));
      const raw = await session.exchange(encodeRequest(request));
      logVerbose(LOG_NAMESPACE, `${this.id} ${request.kind} response`, raw);
      return unwrapDecodeResult(decodeResponse<R['kind']>(request.kind, raw));
    } finally {
      session.close();
    }
  }

  /**
   * Poll status and update the online flag and current file
   *
   * Transport failures mark the printer offline and reject with PRINTER_OFFLINE. A
   * malformed reply rejects with the protocol error and leaves the online flag alone.
   */
  async refreshStatus(): Promise<PrinterStatus> {
    try {
      const status = await this.sendRequest({ kind: 'status' });
      this.online = true;
      this.currentFile = status.currentFile;
      return status;
    } catch (error) {
      if (hasErrorCode(error, ErrorCode.PROTOCOL_MALFORMED_RESPONSE)) {
        throw error;
      }
      this.online = false;
      throw offlineError(this.id, toError(error));
    }
  }

  /**
   * Cached identity, fetching it if no fetch has succeeded yet. Never rejects.
   */
  async getIdentity(): Promise<PrinterIdentity | null> {
    if (this.identity) {
      return this.identity;
    }
    if (!this.identityRequest) {
      this.identityRequest = this.fetchIdentity().finally(() => {
        this.identityRequest = null;
      });
    }
    return await this.identityRequest;
  }

  private async fetchIdentity(): Promise<PrinterIdentity | null> {
    try {
      const identity = await this.sendRequest({ kind: 'info' });
      this.identity = identity;
      return identity;
    } catch (error) {
      logWarning(LOG_NAMESPACE, `Failed to fetch identity for ${this.id}:`, toError(error).message);
      return null;
    }
  }

  /**
   * Identity, rejecting with the request error when it cannot be fetched
   */
  async getInfo(): Promise<PrinterIdentity> {
    if (this.identity) {
      return this.identity;
    }
    const identity = await this.sendRequest({ kind: 'info' });
    this.identity = identity;
    return identity;
  }

  /**
   * Same as refreshStatus(): rejects PRINTER_OFFLINE on transport failure
   */
  async getStatus(): Promise<PrinterStatus> {
    return await this.refreshStatus();
  }

  async getTemperatures(): Promise<PrinterTemperatures> {
    return await this.sendRequest({ kind: 'temperature' });
  }

  async getProgress(): Promise<PrinterProgress> {
    return await this.sendRequest({ kind: 'progress' });
  }

  async getHeadPosition(): Promise<PrinterHeadPosition> {
    return await this.sendRequest({ kind: 'head-position' });
  }

  async setTemperature(toolIndex: number, temperature: number): Promise<void> {
    await this.sendRequest({ kind: 'set-temperature', toolIndex, temperature });
  }

  // ============================================================================
  // CACHED STATE
  // ============================================================================

  isOnline(): boolean {
    return this.online;
  }

  getCurrentFile(): string | null {
    return this.currentFile;
  }

  getCachedIdentity(): PrinterIdentity | null {
    return this.identity;
  }

  /**
   * Display name: the printer's own name once known, its id until then
   */
  getDisplayName(): string {
    return this.identity?.name ?? this.id;
  }

  getCamera(): CameraMultiplexer {
    return this.camera;
  }

  /**
   * Summary built from cached state only
   */
  getSummary(): PrinterSummary {
    return {
      id: this.id,
      name: this.identity?.name ?? null,
      address: this.address.host,
      online: this.online,
      currentFile: this.currentFile,
      firmwareVersion: this.identity?.firmwareVersion ?? null
    };
  }

  shutdown(): void {
    this.camera.stop();
  }
}
