/**
 * @fileoverview Express middleware for access control, error mapping and request logging.
 *
 * Key exports:
 * - createAuthMiddleware(): `x-secret` check, GET/HEAD as reads and everything else as writes
 * - createErrorMiddleware(): AppError code -> HTTP status with a JSON error body
 * - createNotFoundHandler(): JSON 404 for unknown API routes
 * - createRequestLogger(): method, path, status code and duration per request
 */

import type { Request, Response, NextFunction } from 'express';
import { ErrorCode, toAppError } from '../../utils/error.utils';
import { logError, logInfo } from '../../utils/logging';
import type { APIErrorResponse, AccessKind } from '../types/web-api.types';
import { SECRET_HEADER, type AuthManager } from './AuthManager';
import { statusCodeForError } from './routes/route-helpers';

const LOG_NAMESPACE = 'WebUI';

const READ_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD', 'OPTIONS']);

export function accessKindOf(method: string): AccessKind {
  return READ_METHODS.has(method.toUpperCase()) ? 'read' : 'write';
}

/**
 * Authentication middleware factory
 */
export function createAuthMiddleware(authManager: AuthManager) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const access = accessKindOf(req.method);
    const header = req.headers[SECRET_HEADER];
    const presented = Array.isArray(header) ? header[0] : header;

    if (authManager.isAuthorized(access, presented)) {
      next();
      return;
    }

    const response: APIErrorResponse = {
      success: false,
      error: presented === undefined ? 'Missing secret' : 'Invalid secret',
      code: ErrorCode.AUTH_REQUIRED
    };
    res.status(401).json(response);
  };
}

/**
 * Error handling middleware
 */
export function createErrorMiddleware() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const appError = toAppError(err);
    const statusCode = statusCodeForError(appError);
    if (statusCode >= 500) {
      logError(LOG_NAMESPACE, `${req.method} ${req.path} failed:`, appError.message);
    }

    const response: APIErrorResponse = {
      success: false,
      error: appError.message,
      code: appError.code
    };
    res.status(statusCode).json(response);
  };
}

/**
 * JSON 404 for API paths no route matched
 */
export function createNotFoundHandler() {
  return (req: Request, res: Response): void => {
    const response: APIErrorResponse = {
      success: false,
      error: `No route for ${req.method} ${req.originalUrl}`,
      code: 'NOT_FOUND'
    };
    res.status(404).json(response);
  };
}

/**
 * Request logging middleware
 */
export function createRequestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logInfo(LOG_NAMESPACE, `${req.method} ${req.path} - ${res.statusCode} (${duration}ms)`);
    });

    next();
  };
}
