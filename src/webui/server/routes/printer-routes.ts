/**
 * @fileoverview Printer listing, query and control routes.
 *
 * Listing endpoints answer from cached client state without printer I/O. Per-printer
 * queries go through the client, so each one is a fresh TCP exchange under that
 * printer's lock.
 */

import type { Router, Request, Response } from 'express';
import { TemperatureSetRequestSchema, createValidationError } from '../../schemas/web-api.schemas';
import { ErrorCode } from '../../../utils/error.utils';
import type { PrinterClient } from '../../../printer-backends/PrinterClient';
import type {
  DataResponse,
  HealthResponse,
  PrinterListResponse,
  PrinterNamesResponse,
  StandardAPIResponse
} from '../../types/web-api.types';
import {
  resolvePrinter,
  sendAppError,
  sendErrorResponse,
  type RouteDependencies
} from './route-helpers';

type PrinterQuery<T> = (printer: PrinterClient) => Promise<T>;

/**
 * GET endpoints that forward one query to the printer, by path segment.
 *
 * `status` goes through refreshStatus() and so also updates the printer's online flag;
 * an unreachable printer answers PRINTER_OFFLINE there, where the other queries answer
 * PRINTER_CONNECTION or PRINTER_TIMEOUT.
 */
const PRINTER_QUERIES: ReadonlyArray<readonly [string, PrinterQuery<unknown>]> = [
  ['info', printer => printer.getInfo()],
  ['status', printer => printer.getStatus()],
  ['temperatures', printer => printer.getTemperatures()],
  ['progress', printer => printer.getProgress()],
  ['head-position', printer => printer.getHeadPosition()]
];

export function registerPrinterRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/health', async (_req: Request, res: Response) => {
    const printerIds = await deps.registry.listPrinterIds();
    const response: HealthResponse = {
      success: true,
      data: {
        status: 'ok',
        uptimeSeconds: Math.floor((Date.now() - deps.startedAt.getTime()) / 1000),
        printerCount: printerIds.length
      }
    };
    return res.json(response);
  });

  router.get('/printers', async (_req: Request, res: Response) => {
    const response: PrinterListResponse = { success: true, data: await deps.registry.listSummaries() };
    return res.json(response);
  });

  router.get('/printers/names', async (_req: Request, res: Response) => {
    const response: PrinterNamesResponse = { success: true, data: await deps.registry.listPrinterIds() };
    return res.json(response);
  });

  for (const [segment, query] of PRINTER_QUERIES) {
    router.get(`/printers/:printerId/${segment}`, async (req: Request, res: Response) => {
      await handlePrinterQuery(req, res, deps, query);
    });
  }

  router.post('/printers/:printerId/temperature', async (req: Request, res: Response) => {
    try {
      const resolved = await resolvePrinter(req, deps);
      if (!resolved.success) {
        return sendAppError(res, resolved.error);
      }

      const validation = TemperatureSetRequestSchema.safeParse(req.body);
      if (!validation.success) {
        const validationError = createValidationError(validation.error);
        return sendErrorResponse(res, 400, validationError.error, ErrorCode.VALIDATION);
      }

      const { toolIndex, temperature } = validation.data;
      await resolved.printer.setTemperature(toolIndex, temperature);

      const response: StandardAPIResponse = {
        success: true,
        message: `Setting tool ${toolIndex} temperature to ${temperature}°C`
      };
      return res.json(response);
    } catch (error) {
      return sendAppError(res, error);
    }
  });
}

async function handlePrinterQuery<T>(
  req: Request,
  res: Response,
  deps: RouteDependencies,
  query: PrinterQuery<T>
): Promise<Response> {
  try {
    const resolved = await resolvePrinter(req, deps);
    if (!resolved.success) {
      return sendAppError(res, resolved.error);
    }

    const response: DataResponse<T> = { success: true, data: await query(resolved.printer) };
    return res.json(response);
  } catch (error) {
    return sendAppError(res, error);
  }
}
