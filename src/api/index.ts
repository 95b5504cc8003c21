/**
 * API Router Configuration
 *
 * Mounts every route module under its path prefix.
 */

import { Router, json } from 'express';
import { createHealthRouter, createJobRouter, createToolsRouter } from './routes/index.js';
import { errorHandler, requestLogger } from './middleware/index.js';
import type { AppContext } from '../app.js';

export function createApiRouter(ctx: AppContext): Router {
  const router = Router();

  router.use(json({ limit: '1mb' }));
  router.use(requestLogger);

  router.use('/health', createHealthRouter(ctx));
  router.use('/api/tools', createToolsRouter(ctx));
  router.use('/api/jobs', createJobRouter(ctx));

  // Must be last
  router.use(errorHandler);

  return router;
}

export * from './handlers/index.js';
export * from './middleware/index.js';
export * from './routes/index.js';
