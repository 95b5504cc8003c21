/**
 * Job API routes
 */

import { Router } from 'express';
import { JobHandler } from '../handlers/job.handler.js';
import type { AppContext } from '../../app.js';

export function createJobRouter(ctx: AppContext): Router {
  const router = Router();
  const handler = new JobHandler(ctx);

  // POST /jobs/plan - Run a goal through the planner
  router.post('/plan', (req, res, next) => {
    handler.createPlanJob(req, res, next);
  });

  // GET /jobs - List jobs, newest first
  router.get('/', (req, res, next) => {
    handler.list(req, res, next);
  });

  // GET /jobs/:jobId - Get job details
  router.get('/:jobId', (req, res, next) => {
    handler.get(req, res, next);
  });

  // POST /jobs/:jobId/cancel - Request cancellation of a running job
  router.post('/:jobId/cancel', (req, res, next) => {
    handler.cancel(req, res, next);
  });

  // DELETE /jobs/:jobId - Remove a finished job and its artifacts
  router.delete('/:jobId', (req, res, next) => {
    void handler.delete(req, res, next);
  });

  return router;
}
