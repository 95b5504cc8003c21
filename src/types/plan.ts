/**
 * Plan type definitions for goal decomposition
 */

import type { ContextMap, ContextValue } from './context.js';

export type StepStatus = 'pending' | 'running' | 'completed' | 'failed';

export type PlanStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface Step {
  readonly stepNumber: number;
  readonly toolName: string;
  readonly description: string;
  // Checked to be a map by validation, not by parsing
  readonly inputs: ContextValue;
  readonly outputVariable: string;
  status: StepStatus;
  result: ContextMap | null;
  error: string | null;
}

export interface Plan {
  readonly goal: string;
  readonly steps: Step[];
  readonly context: ContextMap;
  readonly createdAt: Date;
  status: PlanStatus;
}

/**
 * Wire shape of a step, as the LLM emits it and as plans are serialized
 */
export interface SerializedStep {
  readonly step_number: number;
  readonly tool_name: string;
  readonly description: string;
  readonly inputs: ContextValue;
  readonly output_variable: string;
  readonly status: StepStatus;
  readonly result: ContextMap | null;
  readonly error: string | null;
}

export interface SerializedPlan {
  readonly goal: string;
  readonly status: PlanStatus;
  readonly context: ContextMap;
  readonly created_at: string;
  readonly steps: SerializedStep[];
}
