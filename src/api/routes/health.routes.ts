/**
 * Health and tool catalogue routes
 */

import { Router } from 'express';
import { HealthHandler } from '../handlers/health.handler.js';
import type { AppContext } from '../../app.js';

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();
  const handler = new HealthHandler(ctx);

  router.get('/', (req, res, next) => {
    void handler.health(req, res, next);
  });

  return router;
}

export function createToolsRouter(ctx: AppContext): Router {
  const router = Router();
  const handler = new HealthHandler(ctx);

  router.get('/', (req, res, next) => {
    handler.tools(req, res, next);
  });

  return router;
}
