/**
 * Job Runner - executes workflow bodies on a bounded worker pool
 *
 * Lifecycle per job:
 * - PENDING -> RUNNING when a pool slot picks it up ("Starting workflow" log)
 * - RUNNING -> COMPLETE when the body returns and no cancellation was requested
 * - RUNNING -> FAILED when the body throws (message only; stack goes to the service log)
 * - RUNNING -> CANCELLED when the cancellation signal is observed
 *
 * Cancellation is cooperative. The body sees it when it next calls `log`
 * (which throws JobCancelledError) or may watch the AbortSignal it receives.
 * Whatever the body throws once the signal is set ends the job CANCELLED.
 * In-flight tool calls are never interrupted. After the body settles, the
 * outcome is decided and written to the store without yielding, so a
 * cancellation either lands before that write (CANCELLED) or is rejected
 * because the job is no longer RUNNING.
 */

import { createChildLogger, createJobLogger } from '../utils/logger.js';
import {
  InvalidJobStateError,
  JobCancelledError,
  NotFoundError,
  ServiceUnavailableError,
  errorMessage,
} from '../utils/errors.js';
import { JobStore } from '../repositories/job.store.js';
import { WorkerPool, type WorkerPoolStats } from './worker-pool.js';
import type { Job } from '../models/job.model.js';
import type { WorkflowResult } from '../types/job.js';

export type LogCallback = (message: string) => void;

/**
 * A workflow body receives its job (a working copy; progress and artifacts set
 * on it are persisted on the next log call and at completion), a log callback
 * that doubles as the cancellation checkpoint, and the job's AbortSignal.
 */
export type WorkflowBody = (
  job: Job,
  log: LogCallback,
  signal: AbortSignal
) => Promise<WorkflowResult> | WorkflowResult;

export interface JobRunnerOptions {
  readonly maxConcurrent: number;
}

export class JobRunner {
  private readonly logger = createChildLogger({ service: 'JobRunner' });
  private readonly controllers = new Map<string, AbortController>();
  private readonly pool: WorkerPool;

  constructor(
    private readonly jobStore: JobStore,
    options: JobRunnerOptions
  ) {
    this.pool = new WorkerPool(options.maxConcurrent, 'jobs');

    this.logger.info({ maxConcurrent: options.maxConcurrent }, 'JobRunner initialized');
  }

  /**
   * Queue a PENDING job for execution and return its ID immediately
   */
  submit(job: Job, body: WorkflowBody): string {
    if (this.pool.isClosed) {
      throw new ServiceUnavailableError('Job runner is shutting down');
    }

    if (job.status !== 'PENDING' || this.controllers.has(job.jobId)) {
      throw new InvalidJobStateError(
        `Job '${job.jobId}' cannot be submitted (status: ${job.status})`,
        { jobId: job.jobId, status: job.status }
      );
    }

    const controller = new AbortController();
    this.controllers.set(job.jobId, controller);

    void this.pool
      .run(() => this.execute(job.clone(), body, controller))
      .catch((error: unknown) => {
        this.controllers.delete(job.jobId);
        this.logger.error({ jobId: job.jobId, err: error }, 'Job could not be scheduled');
      });

    this.logger.debug({ jobId: job.jobId, workflowId: job.workflowId, ...this.pool.stats() }, 'Job submitted');

    return job.jobId;
  }

  /**
   * Request cancellation of a running job.
   *
   * @throws NotFoundError if the job does not exist
   * @throws InvalidJobStateError if the job is not RUNNING
   * @returns false when the job is running but not owned by this runner
   */
  cancel(jobId: string): boolean {
    const job = this.jobStore.get(jobId);

    if (job === undefined) {
      throw new NotFoundError(`Job '${jobId}' not found`, { jobId });
    }

    if (job.status !== 'RUNNING') {
      throw new InvalidJobStateError(
        `Job '${jobId}' is not running (status: ${job.status})`,
        { jobId, status: job.status }
      );
    }

    const controller = this.controllers.get(jobId);
    if (controller === undefined) {
      return false;
    }

    controller.abort();
    this.logger.info({ jobId }, 'Cancellation requested');
    return true;
  }

  isCancellationRequested(jobId: string): boolean {
    return this.controllers.get(jobId)?.signal.aborted ?? false;
  }

  activeJobIds(): string[] {
    return [...this.controllers.keys()];
  }

  stats(): WorkerPoolStats {
    return this.pool.stats();
  }

  /**
   * Signal every outstanding job to cancel and stop accepting work.
   * With `wait`, resolves once every queued and running job has finalized.
   */
  async shutdown(wait = true): Promise<void> {
    this.logger.info({ outstanding: this.controllers.size, wait }, 'Shutting down job runner');

    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    this.pool.close();

    if (wait) {
      await this.pool.drain();
    }
  }

  private async execute(job: Job, body: WorkflowBody, controller: AbortController): Promise<void> {
    const { signal } = controller;
    const logger = createJobLogger(this.logger, job.jobId, job.workflowId);

    try {
      job.markRunning();
      job.addLog(`Starting workflow: ${job.workflowId}`);
      this.jobStore.update(job);

      if (signal.aborted) {
        throw new JobCancelledError(job.jobId);
      }

      const log: LogCallback = (message) => {
        if (signal.aborted) {
          throw new JobCancelledError(job.jobId);
        }
        job.addLog(message);
        this.jobStore.update(job);
      };

      logger.info('Workflow started');
      const result = await body(job, log, signal);

      if (signal.aborted) {
        job.cancel();
        logger.info('Job cancelled after workflow returned');
      } else {
        job.complete(result);
        job.addLog('Workflow complete');
        logger.info('Job completed');
      }
    } catch (error) {
      if (job.isTerminal()) {
        logger.warn({ err: error, status: job.status }, 'Error after job was finalized');
      } else if (error instanceof JobCancelledError || signal.aborted) {
        // Covers bodies that stop on the signal themselves (AbortError, axios CanceledError)
        job.cancel();
        logger.info({ reason: errorMessage(error) }, 'Job cancelled');
      } else {
        logger.error({ err: error }, 'Job failed');
        job.fail(errorMessage(error));
      }
    } finally {
      this.jobStore.update(job);
      this.controllers.delete(job.jobId);
    }
  }
}
