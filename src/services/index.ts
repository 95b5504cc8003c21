/**
 * Service exports
 */

export { WorkerPool } from './worker-pool.js';
export type { WorkerPoolStats } from './worker-pool.js';
export { JobRunner } from './job-runner.js';
export type { JobRunnerOptions, LogCallback, WorkflowBody } from './job-runner.js';
export { LlmClient } from './llm-client.js';
export type { LlmClientSettings } from './llm-client.js';
export { ToolRegistry, createToolRegistry } from './tool-registry.js';
export type { BuiltinToolDeps } from './tool-registry.js';
export { Planner, parsePlanResponse, resolveInputs } from './planner.js';
export type { ExecuteOptions, PlannerOptions, StepHook, ToolSummary } from './planner.js';
export { ArtifactStore } from './artifact-store.js';
export { sweepExpiredJobs } from './retention.js';
export {
  createPlannerWorkflow,
  PLANNER_WORKFLOW_ID,
  PLAN_ARTIFACT_FILENAME,
} from './planner-workflow.js';
export type { PlannerWorkflowRequest } from './planner-workflow.js';
