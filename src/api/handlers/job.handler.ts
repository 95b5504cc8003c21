/**
 * Job API handlers
 */

import type { Request, Response, NextFunction } from 'express';
import { CreatePlanJobSchema, ListJobsQuerySchema, type Job } from '../../models/index.js';
import { InvalidJobStateError, NotFoundError } from '../../utils/errors.js';
import { createPlannerWorkflow, PLANNER_WORKFLOW_ID } from '../../services/planner-workflow.js';
import type { AppContext } from '../../app.js';
import type { ContextMap } from '../../types/context.js';
import type { JobView } from '../../types/job.js';
import type { ListResponse } from '../../types/api.js';
import { sendData } from '../middleware/response.js';

function requireJobId(req: Request): string {
  const jobId = req.params['jobId'];
  if (jobId === undefined || jobId === '') {
    throw new NotFoundError('Job ID required');
  }
  return jobId;
}

export class JobHandler {
  constructor(private readonly ctx: AppContext) {}

  createPlanJob(req: Request, res: Response, next: NextFunction): void {
    try {
      const request = CreatePlanJobSchema.parse(req.body);

      const input: ContextMap = {
        goal: request.goal,
        context: request.context,
        ...(request.allowedTools !== undefined && { allowedTools: [...request.allowedTools] }),
        ...(request.maxSteps !== undefined && { maxSteps: request.maxSteps }),
      };

      const job = this.ctx.jobStore.create(PLANNER_WORKFLOW_ID, input, request.variant, request.options);
      this.ctx.jobRunner.submit(
        job,
        createPlannerWorkflow(this.ctx.planner, request, this.ctx.artifactStore)
      );

      sendData<{ job: JobView }>(req, res, 202, { job: job.toJSON() });
    } catch (error) {
      next(error);
    }
  }

  list(req: Request, res: Response, next: NextFunction): void {
    try {
      const query = ListJobsQuerySchema.parse(req.query);
      const items = this.ctx.jobStore
        .list(query.workflowId)
        .filter((job) => query.status === undefined || job.status === query.status)
        .map((job) => job.toJSON());

      sendData<ListResponse<JobView>>(req, res, 200, { items, total: items.length });
    } catch (error) {
      next(error);
    }
  }

  get(req: Request, res: Response, next: NextFunction): void {
    try {
      const job = this.findJob(requireJobId(req));

      sendData<{ job: JobView }>(req, res, 200, { job: job.toJSON() });
    } catch (error) {
      next(error);
    }
  }

  cancel(req: Request, res: Response, next: NextFunction): void {
    try {
      const jobId = requireJobId(req);

      if (!this.ctx.jobRunner.cancel(jobId)) {
        throw new InvalidJobStateError(`Job '${jobId}' is not managed by this runner`, { jobId });
      }

      const job = this.findJob(jobId);
      sendData<{ cancelled: boolean; job: JobView }>(req, res, 200, { cancelled: true, job: job.toJSON() });
    } catch (error) {
      next(error);
    }
  }

  async delete(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const jobId = requireJobId(req);
      const job = this.findJob(jobId);

      if (!job.isTerminal()) {
        throw new InvalidJobStateError(
          `Job '${jobId}' cannot be deleted while ${job.status}`,
          { jobId, status: job.status }
        );
      }

      this.ctx.jobStore.delete(jobId);
      await this.ctx.artifactStore.removeJob(jobId);

      sendData<{ deleted: boolean }>(req, res, 200, { deleted: true });
    } catch (error) {
      next(error);
    }
  }

  private findJob(jobId: string): Job {
    const job = this.ctx.jobStore.get(jobId);
    if (job === undefined) {
      throw new NotFoundError(`Job '${jobId}' not found`, { jobId });
    }
    return job;
  }
}
