/**
 * Job type definitions for tracked workflow execution
 */

import type { ContextMap } from './context.js';

export type JobStatus = 'PENDING' | 'RUNNING' | 'COMPLETE' | 'FAILED' | 'CANCELLED';

export const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'COMPLETE',
  'FAILED',
  'CANCELLED',
]);

export type ArtifactType = 'text' | 'json' | 'image' | 'video' | 'csv';

export interface Artifact {
  readonly type: ArtifactType;
  readonly label: string;
  readonly path: string;
  readonly preview?: string | undefined;
}

export type WorkflowResult = ContextMap;

/**
 * Externalized job view consumed by presentation layers
 */
export interface JobView {
  readonly jobId: string;
  readonly workflowId: string;
  readonly status: JobStatus;
  readonly progress: number;
  readonly currentStep: string | null;
  readonly logs: ReadonlyArray<string>;
  readonly artifacts: ReadonlyArray<Artifact>;
  readonly result: WorkflowResult | null;
  readonly error: string | null;
  readonly input: ContextMap;
  readonly variant: number;
  readonly options: ContextMap;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly completedAt?: string;
}
