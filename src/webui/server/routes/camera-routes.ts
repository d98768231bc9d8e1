/**
 * @fileoverview Camera snapshot, stream re-broadcast and status routes.
 *
 * The stream route subscribes a viewer to the printer's camera multiplexer and writes
 * each frame as a `multipart/x-mixed-replace` part until the client disconnects or
 * the upstream fails. A viewer that stops reading loses its oldest queued frames.
 */

import type { Router, Request, Response } from 'express';
import { SnapshotQuerySchema, createValidationError } from '../../schemas/web-api.schemas';
import { ErrorCode, toError } from '../../../utils/error.utils';
import { writeMultipartFrames } from '../../../utils/camera-utils';
import { DEFAULT_MJPEG_BOUNDARY } from '../../../types/camera';
import { logVerbose, logWarning } from '../../../utils/logging';
import type { CameraStatusResponse } from '../../types/web-api.types';
import {
  resolvePrinter,
  sendAppError,
  sendErrorResponse,
  type RouteDependencies
} from './route-helpers';

const LOG_NAMESPACE = 'WebUI';

export function registerCameraRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/printers/:printerId/camera/snapshot', async (req: Request, res: Response) => {
    try {
      const resolved = await resolvePrinter(req, deps);
      if (!resolved.success) {
        return sendAppError(res, resolved.error);
      }

      const query = SnapshotQuerySchema.safeParse(req.query);
      if (!query.success) {
        const validationError = createValidationError(query.error);
        return sendErrorResponse(res, 400, validationError.error, ErrorCode.VALIDATION);
      }

      const frame = await resolved.printer.getCamera().snapshot(query.data.timeoutMs);
      res.setHeader('Cache-Control', 'no-store');
      return res.type('image/jpeg').send(frame.data);
    } catch (error) {
      return sendAppError(res, error, { cameraRoute: true });
    }
  });

  router.get('/printers/:printerId/camera/status', async (req: Request, res: Response) => {
    try {
      const resolved = await resolvePrinter(req, deps);
      if (!resolved.success) {
        return sendAppError(res, resolved.error);
      }

      const response: CameraStatusResponse = { success: true, data: resolved.printer.getCamera().getStatus() };
      return res.json(response);
    } catch (error) {
      return sendAppError(res, error);
    }
  });

  router.get('/printers/:printerId/camera/stream', async (req: Request, res: Response) => {
    const resolved = await resolvePrinter(req, deps);
    if (!resolved.success) {
      sendAppError(res, resolved.error);
      return;
    }

    const printerId = resolved.printer.id;
    const receiver = resolved.printer.getCamera().subscribe();
    res.on('close', () => receiver.close());

    res.writeHead(200, {
      'Content-Type': `multipart/x-mixed-replace; boundary=${DEFAULT_MJPEG_BOUNDARY}`,
      'Cache-Control': 'no-cache, no-store, must-revalidate',
      'Pragma': 'no-cache',
      'Connection': 'close'
    });
    logVerbose(LOG_NAMESPACE, `Camera viewer attached to ${printerId}`);

    try {
      await writeMultipartFrames(receiver, res, DEFAULT_MJPEG_BOUNDARY);
    } catch (error) {
      logWarning(LOG_NAMESPACE, `Camera stream for ${printerId} ended:`, toError(error).message);
    } finally {
      receiver.close();
      res.end();
    }
  });
}
