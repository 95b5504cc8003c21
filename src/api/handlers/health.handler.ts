/**
 * Health check and tool catalogue handlers
 */

import type { Request, Response, NextFunction } from 'express';
import type { AppContext } from '../../app.js';
import type { HealthCheck, HealthCheckResponse } from '../../types/api.js';
import type { ToolDescription } from '../../types/tools.js';
import { sendData } from '../middleware/response.js';

export class HealthHandler {
  constructor(private readonly ctx: AppContext) {}

  async health(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const started = Date.now();
      const llmReachable = await this.ctx.llm.isConnected();
      const llmCheck: HealthCheck = llmReachable
        ? { status: 'pass', latencyMs: Date.now() - started }
        : { status: 'fail', latencyMs: Date.now() - started, message: 'LLM server unreachable' };

      const { active, queued, maxConcurrent } = this.ctx.jobRunner.stats();
      const jobsCheck: HealthCheck = {
        status: queued > 0 && active >= maxConcurrent ? 'warn' : 'pass',
        message: `${active}/${maxConcurrent} running, ${queued} queued`,
      };

      const body: HealthCheckResponse = {
        status: llmReachable ? 'healthy' : 'degraded',
        version: process.env['npm_package_version'] ?? '1.0.0',
        uptime: Math.floor((Date.now() - this.ctx.startedAt) / 1000),
        checks: { llm: llmCheck, jobs: jobsCheck },
      };

      sendData(req, res, 200, body);
    } catch (error) {
      next(error);
    }
  }

  tools(req: Request, res: Response, next: NextFunction): void {
    try {
      sendData<{ tools: ToolDescription[] }>(req, res, 200, { tools: this.ctx.toolRegistry.describeAll() });
    } catch (error) {
      next(error);
    }
  }
}
