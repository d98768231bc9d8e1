/**
 * @fileoverview Shared helpers and dependency contract for API route modules.
 *
 * Centralizes printer lookup from the `:printerId` parameter and the mapping from
 * AppError codes to HTTP status codes so every route answers failures the same way.
 */

import type { Request, Response } from 'express';
import type { PrinterRegistry } from '../../../managers/PrinterRegistry';
import type { ConfigManager } from '../../../managers/ConfigManager';
import type { PrinterClient } from '../../../printer-backends/PrinterClient';
import { AppError, ErrorCode, toAppError, unknownPrinterError } from '../../../utils/error.utils';
import { logWarning } from '../../../utils/logging';
import { PrinterIdParamSchema } from '../../schemas/web-api.schemas';
import type { APIErrorResponse } from '../../types/web-api.types';

/**
 * Dependencies shared across route modules
 */
export interface RouteDependencies {
  readonly registry: PrinterRegistry;
  readonly configManager: ConfigManager;
  readonly startedAt: Date;
}

export interface ErrorMappingOptions {
  /** Camera routes answer 503 for an unavailable or silent camera */
  readonly cameraRoute?: boolean;
}

/**
 * Result union for printer lookups
 */
export type PrinterResolutionResult =
  | { success: true; printer: PrinterClient }
  | { success: false; error: AppError };

/**
 * HTTP status for an AppError
 */
export function statusCodeForError(error: AppError, options: ErrorMappingOptions = {}): number {
  switch (error.code) {
    case ErrorCode.UNKNOWN_PRINTER:
      return 404;
    case ErrorCode.VALIDATION:
      return 400;
    case ErrorCode.AUTH_REQUIRED:
      return 401;
    case ErrorCode.CAMERA_UNAVAILABLE:
      return 503;
    case ErrorCode.TIMEOUT:
      return options.cameraRoute ? 503 : 500;
    default:
      return 500;
  }
}

/**
 * Look up the printer named by the `printerId` route parameter
 */
export async function resolvePrinter(req: Request, deps: RouteDependencies): Promise<PrinterResolutionResult> {
  const params = PrinterIdParamSchema.safeParse(req.params);
  if (!params.success) {
    return { success: false, error: new AppError('Printer id is required', ErrorCode.VALIDATION) };
  }

  const printer = await deps.registry.getPrinter(params.data.printerId);
  if (!printer) {
    return { success: false, error: unknownPrinterError(params.data.printerId) };
  }
  return { success: true, printer };
}

/**
 * Convenience helper for returning standardized error payloads
 */
export function sendErrorResponse(res: Response, statusCode: number, message: string, code: string): Response {
  const payload: APIErrorResponse = { success: false, error: message, code };
  return res.status(statusCode).json(payload);
}

/**
 * Answer a failed request from whatever was thrown
 */
export function sendAppError(res: Response, error: unknown, options: ErrorMappingOptions = {}): Response {
  const appError = toAppError(error);
  const statusCode = statusCodeForError(appError, options);
  if (statusCode >= 500) {
    logWarning('WebUI', `${appError.code}: ${appError.message}`);
  }
  return sendErrorResponse(res, statusCode, appError.message, appError.code);
}
