/**
 * Planner workflow - runs a goal through the Planner as a tracked job
 */

import { InternalError, JobExecutionError } from '../utils/errors.js';
import { serializePlan } from '../models/plan.model.js';
import { toContextValue, type ContextMap } from '../types/context.js';
import type { Planner } from './planner.js';
import type { ArtifactStore } from './artifact-store.js';
import type { WorkflowBody } from './job-runner.js';

export const PLANNER_WORKFLOW_ID = 'planner';
export const PLAN_ARTIFACT_FILENAME = 'plan.json';

export interface PlannerWorkflowRequest {
  readonly goal: string;
  readonly context: ContextMap;
  readonly allowedTools?: readonly string[] | undefined;
  readonly maxSteps?: number | undefined;
}

export function createPlannerWorkflow(
  planner: Planner,
  request: PlannerWorkflowRequest,
  artifactStore?: ArtifactStore
): WorkflowBody {
  return async (job, log) => {
    log(`Planning: ${request.goal}`);

    const plan = await planner.execute(request.goal, request.context, {
      ...(request.allowedTools !== undefined && { allowedTools: request.allowedTools }),
      ...(request.maxSteps !== undefined && { maxSteps: request.maxSteps }),
      onStep: (step, index, total) => {
        const label = step.description !== '' ? step.description : `Step ${step.stepNumber}`;
        job.setProgress(index / total, label);
        log(`Step ${index + 1}/${total} (${step.toolName}): ${label}`);
      },
    });

    const serialized = toContextValue(serializePlan(plan));
    if (serialized === undefined) {
      throw new InternalError('Plan could not be serialized');
    }

    if (artifactStore !== undefined) {
      const artifact = await artifactStore.saveJson(job.jobId, PLAN_ARTIFACT_FILENAME, serialized, 'Execution plan');
      job.addArtifact(artifact);
    }

    const failed = plan.steps.find((step) => step.status === 'failed');
    if (plan.status === 'failed' && failed !== undefined) {
      throw new JobExecutionError(
        job.jobId,
        `Step ${failed.stepNumber} (${failed.toolName}) failed: ${failed.error ?? 'unknown error'}`
      );
    }

    log(`Plan completed: ${plan.steps.length} step(s)`);
    return { plan: serialized, context: plan.context };
  };
}
