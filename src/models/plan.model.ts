/**
 * Plan model: wire schema for LLM-generated plans and (de)serialization
 */

import { z } from 'zod';
import { ContextMapSchema, ContextValueSchema } from './job.model.js';
import { cloneContext, type ContextMap } from '../types/context.js';
import type { Plan, SerializedPlan, SerializedStep, Step } from '../types/plan.js';

/**
 * A single step as emitted by the planning model.
 * Only the structure is enforced here; semantic checks belong to plan validation.
 */
export const PlanStepInputSchema = z.object({
  step_number: z.coerce.number().int().min(1),
  tool_name: z.string().min(1),
  description: z.string().default(''),
  inputs: ContextValueSchema,
  output_variable: z.string(),
});

export const PlanResponseSchema = z.object({
  steps: z.array(PlanStepInputSchema),
});

export type PlanStepInput = z.infer<typeof PlanStepInputSchema>;
export type PlanResponse = z.infer<typeof PlanResponseSchema>;

/**
 * Request to run a goal through the planner as a tracked job
 */
export const CreatePlanJobSchema = z.object({
  goal: z
    .string()
    .trim()
    .min(3, 'Goal must be at least 3 characters')
    .max(5000, 'Goal must not exceed 5000 characters'),
  context: ContextMapSchema.default({}),
  allowedTools: z.array(z.string().min(1)).min(1).optional(),
  maxSteps: z.number().int().min(1).max(50).optional(),
  variant: z.number().int().min(1).default(1),
  options: ContextMapSchema.default({}),
});

export type CreatePlanJobInput = z.infer<typeof CreatePlanJobSchema>;

export function createStep(input: PlanStepInput): Step {
  return {
    stepNumber: input.step_number,
    toolName: input.tool_name,
    description: input.description,
    inputs: input.inputs,
    outputVariable: input.output_variable,
    status: 'pending',
    result: null,
    error: null,
  };
}

/**
 * Build a pending plan. The context is deep-copied so the caller's
 * initial context is never mutated by execution.
 */
export function createPlan(goal: string, steps: Step[], initialContext: ContextMap): Plan {
  return {
    goal,
    steps,
    context: cloneContext(initialContext),
    createdAt: new Date(),
    status: 'pending',
  };
}

export function serializeStep(step: Step): SerializedStep {
  return {
    step_number: step.stepNumber,
    tool_name: step.toolName,
    description: step.description,
    inputs: step.inputs,
    output_variable: step.outputVariable,
    status: step.status,
    result: step.result,
    error: step.error,
  };
}

export function serializePlan(plan: Plan): SerializedPlan {
  return {
    goal: plan.goal,
    status: plan.status,
    context: plan.context,
    created_at: plan.createdAt.toISOString(),
    steps: plan.steps.map(serializeStep),
  };
}
