/**
 * @fileoverview Express router composition for the HTTP API.
 *
 * Each domain registers its routes on one router with the shared dependencies; the
 * router answers unknown API paths with a JSON 404.
 */

import { Router } from 'express';
import type { RouteDependencies } from './routes/route-helpers';
import { registerPrinterRoutes } from './routes/printer-routes';
import { registerCameraRoutes } from './routes/camera-routes';
import { createNotFoundHandler } from './auth-middleware';

export function createAPIRoutes(deps: RouteDependencies): Router {
  const router = Router();

  registerPrinterRoutes(router, deps);
  registerCameraRoutes(router, deps);

  router.use(createNotFoundHandler());

  return router;
}
