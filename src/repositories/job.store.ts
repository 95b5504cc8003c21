/**
 * In-memory job store
 *
 * Single source of truth for job records. Every method is synchronous, so each
 * call runs to completion on the event loop before any other caller observes
 * the map; nothing is held across an await. Records are copied on the way in
 * and out, so callers never share mutable state with the store.
 */

import { v4 as uuidv4 } from 'uuid';
import { createChildLogger } from '../utils/logger.js';
import { Job } from '../models/job.model.js';
import type { ContextMap } from '../types/context.js';
import type { JobStatus } from '../types/job.js';

const MS_PER_HOUR = 60 * 60 * 1000;

export function generateJobId(): string {
  return `job_${uuidv4().replace(/-/g, '').slice(0, 12)}`;
}

export class JobStore {
  private readonly logger = createChildLogger({ repository: 'JobStore' });
  private readonly jobs = new Map<string, Job>();

  create(
    workflowId: string,
    input: ContextMap = {},
    variant = 1,
    options: ContextMap = {}
  ): Job {
    let jobId = generateJobId();
    while (this.jobs.has(jobId)) {
      jobId = generateJobId();
    }

    const job = new Job({ jobId, workflowId, input, variant, options });
    this.jobs.set(jobId, job.clone());

    this.logger.debug({ jobId, workflowId }, 'Created job');

    return job;
  }

  get(jobId: string): Job | undefined {
    return this.jobs.get(jobId)?.clone();
  }

  /**
   * Overwrite a record by ID. Returns false, without throwing, when the job is
   * unknown or when the stored record has already reached a terminal status.
   */
  update(job: Job): boolean {
    const existing = this.jobs.get(job.jobId);

    if (existing === undefined) {
      this.logger.debug({ jobId: job.jobId }, 'Ignoring update for unknown job');
      return false;
    }

    if (existing.isTerminal()) {
      this.logger.warn(
        { jobId: job.jobId, status: existing.status, attempted: job.status },
        'Ignoring update to finalized job'
      );
      return false;
    }

    this.jobs.set(job.jobId, job.clone());
    return true;
  }

  /**
   * List jobs, newest first, optionally restricted to one workflow
   */
  list(workflowId?: string): Job[] {
    const jobs: Job[] = [];
    for (const job of this.jobs.values()) {
      if (workflowId === undefined || job.workflowId === workflowId) {
        jobs.push(job.clone());
      }
    }
    return jobs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  delete(jobId: string): boolean {
    return this.jobs.delete(jobId);
  }

  count(status?: JobStatus): number {
    if (status === undefined) {
      return this.jobs.size;
    }
    let total = 0;
    for (const job of this.jobs.values()) {
      if (job.status === status) {
        total++;
      }
    }
    return total;
  }

  /**
   * Remove jobs created more than maxAgeHours ago. RUNNING jobs are kept
   * regardless of age.
   *
   * @returns Number of jobs removed
   */
  cleanupOlderThan(maxAgeHours: number, now: Date = new Date()): number {
    return this.removeOlderThan(maxAgeHours, now).length;
  }

  /**
   * Same eviction as cleanupOlderThan, returning the removed job IDs
   */
  removeOlderThan(maxAgeHours: number, now: Date = new Date()): string[] {
    const cutoff = now.getTime() - maxAgeHours * MS_PER_HOUR;
    const removed: string[] = [];

    for (const [jobId, job] of this.jobs) {
      if (job.createdAt.getTime() < cutoff && job.status !== 'RUNNING') {
        this.jobs.delete(jobId);
        removed.push(jobId);
      }
    }

    if (removed.length > 0) {
      this.logger.info({ removed: removed.length, maxAgeHours }, 'Removed expired jobs');
    }

    return removed;
  }
}
