/**
 * Job model and validation schemas
 */

import { z } from 'zod';
import { InvalidJobStateError } from '../utils/errors.js';
import { cloneContext, type ContextMap, type ContextValue } from '../types/context.js';
import {
  TERMINAL_JOB_STATUSES,
  type Artifact,
  type JobStatus,
  type JobView,
  type WorkflowResult,
} from '../types/job.js';

export const JobStatusSchema = z.enum(['PENDING', 'RUNNING', 'COMPLETE', 'FAILED', 'CANCELLED']);

export const ContextValueSchema: z.ZodType<ContextValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ContextValueSchema),
    z.record(ContextValueSchema),
  ])
);

export const ContextMapSchema = z.record(ContextValueSchema);

export const ListJobsQuerySchema = z.object({
  workflowId: z.string().min(1).optional(),
  status: JobStatusSchema.optional(),
});

export type ListJobsQuery = z.infer<typeof ListJobsQuerySchema>;

export interface JobInit {
  readonly jobId: string;
  readonly workflowId: string;
  readonly input?: ContextMap;
  readonly variant?: number;
  readonly options?: ContextMap;
  readonly now?: Date;
}

/**
 * Format a log line the way every job log is stored: "[HH:MM:SS] message" in UTC
 */
export function formatLogLine(message: string, at: Date = new Date()): string {
  return `[${at.toISOString().slice(11, 19)}] ${message}`;
}

/**
 * Mutable job record. Only the JobStore keeps the canonical copy;
 * everyone else works on clones and writes back through JobStore.update.
 */
export class Job {
  readonly jobId: string;
  readonly workflowId: string;
  readonly input: ContextMap;
  readonly variant: number;
  readonly options: ContextMap;
  readonly createdAt: Date;

  private _status: JobStatus = 'PENDING';
  private _progress = 0;
  private _currentStep: string | null = null;
  private readonly _logs: string[] = [];
  private readonly _artifacts: Artifact[] = [];
  private _result: WorkflowResult | null = null;
  private _error: string | null = null;
  private _updatedAt: Date;
  private _completedAt: Date | null = null;

  constructor(init: JobInit) {
    const now = init.now ?? new Date();
    this.jobId = init.jobId;
    this.workflowId = init.workflowId;
    this.input = init.input ?? {};
    this.variant = init.variant ?? 1;
    this.options = init.options ?? {};
    this.createdAt = now;
    this._updatedAt = now;
  }

  get status(): JobStatus {
    return this._status;
  }

  get progress(): number {
    return this._progress;
  }

  get currentStep(): string | null {
    return this._currentStep;
  }

  get logs(): ReadonlyArray<string> {
    return this._logs;
  }

  get artifacts(): ReadonlyArray<Artifact> {
    return this._artifacts;
  }

  get result(): WorkflowResult | null {
    return this._result;
  }

  get error(): string | null {
    return this._error;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get completedAt(): Date | null {
    return this._completedAt;
  }

  isTerminal(): boolean {
    return TERMINAL_JOB_STATUSES.has(this._status);
  }

  addLog(message: string): void {
    const now = new Date();
    this._logs.push(formatLogLine(message, now));
    this._updatedAt = now;
  }

  addArtifact(artifact: Artifact): void {
    this._artifacts.push({ ...artifact });
    this._updatedAt = new Date();
  }

  /**
   * Update progress (clamped to [0, 1]) and optionally the current step label
   */
  setProgress(progress: number, step?: string): void {
    const value = Number.isNaN(progress) ? this._progress : progress;
    this._progress = Math.min(1, Math.max(0, value));
    if (step !== undefined && step !== '') {
      this._currentStep = step;
    }
    this._updatedAt = new Date();
  }

  markRunning(): void {
    if (this._status !== 'PENDING') {
      throw new InvalidJobStateError(
        `Job '${this.jobId}' cannot start from status ${this._status}`,
        { jobId: this.jobId, status: this._status }
      );
    }
    this._status = 'RUNNING';
    this._updatedAt = new Date();
  }

  complete(result: WorkflowResult): void {
    this.finish('COMPLETE');
    this._result = result;
    this._progress = 1;
  }

  fail(error: string): void {
    this.finish('FAILED');
    this._error = error;
    this.addLog(`ERROR: ${error}`);
  }

  cancel(): void {
    this.finish('CANCELLED');
    this.addLog('Job cancelled by user');
  }

  clone(): Job {
    const copy = new Job({
      jobId: this.jobId,
      workflowId: this.workflowId,
      input: cloneContext(this.input),
      variant: this.variant,
      options: cloneContext(this.options),
      now: this.createdAt,
    });
    copy._status = this._status;
    copy._progress = this._progress;
    copy._currentStep = this._currentStep;
    copy._logs.push(...this._logs);
    copy._artifacts.push(...this._artifacts.map((a) => ({ ...a })));
    copy._result = this._result === null ? null : cloneContext(this._result);
    copy._error = this._error;
    copy._updatedAt = this._updatedAt;
    copy._completedAt = this._completedAt;
    return copy;
  }

  toJSON(): JobView {
    return {
      jobId: this.jobId,
      workflowId: this.workflowId,
      status: this._status,
      progress: this._progress,
      currentStep: this._currentStep,
      logs: [...this._logs],
      artifacts: this._artifacts.map((a) => ({ ...a })),
      result: this._result,
      error: this._error,
      input: this.input,
      variant: this.variant,
      options: this.options,
      createdAt: this.createdAt.toISOString(),
      updatedAt: this._updatedAt.toISOString(),
      ...(this._completedAt !== null ? { completedAt: this._completedAt.toISOString() } : {}),
    };
  }

  private finish(status: JobStatus): void {
    if (this.isTerminal()) {
      throw new InvalidJobStateError(
        `Job '${this.jobId}' is already ${this._status}`,
        { jobId: this.jobId, status: this._status }
      );
    }
    const now = new Date();
    this._status = status;
    this._currentStep = null;
    this._completedAt = now;
    this._updatedAt = now;
  }
}
