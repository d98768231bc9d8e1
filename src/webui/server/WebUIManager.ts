/**
 * @fileoverview HTTP server coordinator: builds the Express app and owns the listening server.
 *
 * Key exports:
 * - createApp(): Express application with logging, JSON parsing, access control, API
 *   routes and error mapping; used directly by route tests
 * - WebUIManager: start/stop lifecycle around an http.Server
 * - Events: 'server-started', 'server-stopped'
 */

import { EventEmitter } from 'events';
import * as http from 'http';
import express from 'express';
import { AppError, ErrorCode } from '../../utils/error.utils';
import { logInfo } from '../../utils/logging';
import { AuthManager } from './AuthManager';
import {
  createAuthMiddleware,
  createErrorMiddleware,
  createRequestLogger
} from './auth-middleware';
import { createAPIRoutes } from './api-routes';
import type { RouteDependencies } from './routes/route-helpers';

const LOG_NAMESPACE = 'WebUIManager';

/**
 * Server status information
 */
export interface WebUIServerStatus {
  readonly isRunning: boolean;
  readonly host: string;
  readonly port: number;
  readonly url: string;
}

export interface WebUIListenOptions {
  readonly host: string;
  /** 0 picks a free port */
  readonly port: number;
}

/**
 * Build the Express application
 */
export function createApp(deps: RouteDependencies): express.Application {
  const app = express();

  app.use(createRequestLogger());
  app.use(express.json());
  app.use('/api', createAuthMiddleware(new AuthManager(deps.configManager)));
  app.use('/api', createAPIRoutes(deps));

  // Error handling (must be last)
  app.use(createErrorMiddleware());

  return app;
}

export class WebUIManager extends EventEmitter {
  private httpServer: http.Server | null = null;
  private host = '0.0.0.0';
  private port = 0;

  constructor(private readonly deps: RouteDependencies) {
    super();
  }

  /**
   * Start listening
   *
   * @throws AppError NETWORK when the port is taken or not permitted
   */
  public async start(options: WebUIListenOptions): Promise<WebUIServerStatus> {
    if (this.httpServer) {
      logInfo(LOG_NAMESPACE, 'HTTP server is already running');
      return this.getStatus();
    }

    const server = http.createServer(createApp(this.deps));
    await this.listen(server, options);
    this.httpServer = server;

    const address = server.address();
    this.host = options.host;
    this.port = address !== null && typeof address !== 'string' ? address.port : options.port;

    const status = this.getStatus();
    logInfo(LOG_NAMESPACE, `HTTP API listening at ${status.url}`);
    this.emit('server-started', status);
    return status;
  }

  /**
   * Stop accepting requests and drop open connections, camera streams included
   */
  public async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return;
    }
    this.httpServer = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    logInfo(LOG_NAMESPACE, 'HTTP server stopped');
    this.emit('server-stopped');
  }

  public getStatus(): WebUIServerStatus {
    return {
      isRunning: this.httpServer !== null,
      host: this.host,
      port: this.port,
      url: `http://${this.host}:${this.port}`
    };
  }

  public isServerRunning(): boolean {
    return this.httpServer !== null;
  }

  private listen(server: http.Server, options: WebUIListenOptions): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException): void => {
        if (err.code === 'EADDRINUSE') {
          reject(new AppError(
            `Port ${options.port} is already in use. Choose a different server.port.`,
            ErrorCode.NETWORK,
            { port: options.port },
            err
          ));
        } else if (err.code === 'EACCES') {
          reject(new AppError(
            `Access denied to port ${options.port}. Try a port number above 1024.`,
            ErrorCode.NETWORK,
            { port: options.port },
            err
          ));
        } else {
          reject(err);
        }
      };

      server.once('error', onError);
      server.listen(options.port, options.host, () => {
        server.removeListener('error', onError);
        resolve();
      });
    });
  }
}
