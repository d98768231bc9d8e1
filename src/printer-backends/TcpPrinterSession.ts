/**
 * @fileoverview One TCP session with a printer: connect, write a command, read its reply.
 *
 * The printer serves a single session at a time and expects a fresh connection per
 * request, so a session is opened, used for the handshake plus one command, and
 * destroyed. Reads accumulate until a line reading exactly `ok` arrives or the
 * printer closes the socket; in the latter case whatever was received is returned and
 * left for the decoder to judge.
 */

import * as net from 'net';
import { connectionError, ErrorCode } from '../utils/error.utils';
import { hasResponseTerminator } from '../protocol';
import { withTimeout } from '../utils/ShutdownTimeout';
import { logVerbose } from '../utils/logging';

const LOG_NAMESPACE = 'TcpPrinterSession';

export const DEFAULT_PRINTER_PORT = 8899;
export const DEFAULT_WRITE_TIMEOUT_MS = 3000;
export const DEFAULT_READ_TIMEOUT_MS = 10000;

export interface TcpSessionOptions {
  readonly host: string;
  readonly port: number;
  /** Bounds connection establishment and every write */
  readonly writeTimeoutMs?: number;
  readonly readTimeoutMs?: number;
}

interface PendingRead {
  resolve: (text: string) => void;
  reject: (error: Error) => void;
}

export class TcpPrinterSession {
  private buffer = '';
  private ended = false;
  private socketError: Error | null = null;
  private pendingRead: PendingRead | null = null;

  private constructor(
    private readonly socket: net.Socket,
    private readonly endpoint: string,
    private readonly writeTimeoutMs: number,
    private readonly readTimeoutMs: number
  ) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      this.buffer += chunk;
      this.settlePendingRead();
    });
    socket.on('end', () => {
      this.ended = true;
      this.settlePendingRead();
    });
    socket.on('close', () => {
      this.ended = true;
      this.settlePendingRead();
    });
    socket.on('error', (error: Error) => {
      this.socketError = error;
      this.settlePendingRead();
    });
  }

  /**
   * Connect to the printer. Establishment is bounded by the write timeout.
   */
  static async open(options: TcpSessionOptions): Promise<TcpPrinterSession> {
    const writeTimeoutMs = options.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
    const readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    const endpoint = `${options.host}:${options.port}`;
    const socket = new net.Socket();

    const connected = new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(connectionError(`Failed to connect to ${endpoint}`, { endpoint }, error));
      };
      socket.once('error', onError);
      socket.connect(options.port, options.host, () => {
        socket.off('error', onError);
        resolve();
      });
    });

    try {
      await withTimeout(connected, {
        timeoutMs: writeTimeoutMs,
        operation: `connect ${endpoint}`,
        code: ErrorCode.PRINTER_TIMEOUT,
        silent: true
      });
    } catch (error) {
      socket.destroy();
      throw error;
    }

    logVerbose(LOG_NAMESPACE, `connected to ${endpoint}`);
    return new TcpPrinterSession(socket, endpoint, writeTimeoutMs, readTimeoutMs);
  }

  /**
   * Write one command line, bounded by the write timeout
   */
  async write(command: string): Promise<void> {
    if (this.socketError) {
      throw connectionError(`Write to ${this.endpoint} failed`, { endpoint: this.endpoint }, this.socketError);
    }

    const written = new Promise<void>((resolve, reject) => {
      this.socket.write(command, (error?: Error | null) => {
        if (error) {
          reject(connectionError(`Write to ${this.endpoint} failed`, { endpoint: this.endpoint }, error));
          return;
        }
        resolve();
      });
    });

    await withTimeout(written, {
      timeoutMs: this.writeTimeoutMs,
      operation: `write ${this.endpoint}`,
      code: ErrorCode.PRINTER_TIMEOUT,
      silent: true
    });
  }

  /**
   * Read one response: everything up to the terminator line, or up to socket end
   */
  async read(): Promise<string> {
    const received = new Promise<string>((resolve, reject) => {
      this.pendingRead = { resolve, reject };
      this.settlePendingRead();
    });

    try {
      return await withTimeout(received, {
        timeoutMs: this.readTimeoutMs,
        operation: `read ${this.endpoint}`,
        code: ErrorCode.PRINTER_TIMEOUT,
        silent: true
      });
    } finally {
      this.pendingRead = null;
    }
  }

  /**
   * Write a command and read its response
   */
  async exchange(command: string): Promise<string> {
    await this.write(command);
    return await this.read();
  }

  close(): void {
    this.socket.destroy();
  }

  private settlePendingRead(): void {
    const pending = this.pendingRead;
    if (!pending) {
      return;
    }

    if (this.socketError) {
      this.pendingRead = null;
      pending.reject(connectionError(
        `Read from ${this.endpoint} failed`,
        { endpoint: this.endpoint },
        this.socketError
      ));
      return;
    }

    if (hasResponseTerminator(this.buffer) || this.ended) {
      const text = this.buffer;
      this.buffer = '';
      this.pendingRead = null;
      pending.resolve(text);
    }
  }
}
