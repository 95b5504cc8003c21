/**
 * Model exports
 */

export {
  Job,
  formatLogLine,
  JobStatusSchema,
  ContextValueSchema,
  ContextMapSchema,
  ListJobsQuerySchema,
  type JobInit,
  type ListJobsQuery,
} from './job.model.js';

export {
  PlanStepInputSchema,
  PlanResponseSchema,
  CreatePlanJobSchema,
  createStep,
  createPlan,
  serializeStep,
  serializePlan,
  type PlanStepInput,
  type PlanResponse,
  type CreatePlanJobInput,
} from './plan.model.js';
