/**
 * Planner - turns a goal into a validated tool plan and runs it
 *
 * A single LLM call produces the plan as JSON. Every step is checked against
 * the tool registry (and an optional whitelist) before anything executes.
 * Steps then run one at a time, in step-number order, sharing a context map
 * through `$variable` references.
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger.js';
import {
  PlanJsonInvalidError,
  PlanJsonNotFoundError,
  PlanShapeError,
  PlanValidationError,
  ToolExecutionError,
  VariableNotFoundError,
  errorMessage,
} from '../utils/errors.js';
import { PlanResponseSchema, createPlan, createStep, type PlanResponse } from '../models/plan.model.js';
import { isContextMap, setContextEntry, type ContextMap } from '../types/context.js';
import type { TextGenerator } from '../types/llm.js';
import type { Plan, Step } from '../types/plan.js';
import type { ToolSchema } from '../types/tools.js';
import type { ToolRegistry } from './tool-registry.js';

const PLAN_JSON_PATTERN = /\{[\s\S]*"steps"[\s\S]*\}/;
const RAW_EXCERPT_LENGTH = 200;
const VARIABLE_SIGIL = '$';

export interface PlannerOptions {
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly defaultMaxSteps?: number;
}

/**
 * Called before each step runs. Errors thrown here abort execution and
 * propagate to the caller rather than failing the step.
 */
export type StepHook = (step: Step, index: number, total: number) => void | Promise<void>;

export interface ExecuteOptions {
  readonly allowedTools?: readonly string[];
  readonly maxSteps?: number;
  readonly onStep?: StepHook;
}

export interface ToolSummary {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolSchema['properties'];
}

/**
 * Replace every top-level string value of the form "$name" with context[name].
 * Nested values are passed through untouched.
 */
export function resolveInputs(inputs: ContextMap, context: ContextMap): ContextMap {
  const resolved: ContextMap = {};
  for (const [key, value] of Object.entries(inputs)) {
    if (typeof value === 'string' && value.startsWith(VARIABLE_SIGIL)) {
      const variableName = value.slice(VARIABLE_SIGIL.length);
      const bound = Object.prototype.hasOwnProperty.call(context, variableName) ? context[variableName] : undefined;
      if (bound === undefined) {
        throw new VariableNotFoundError(variableName);
      }
      setContextEntry(resolved, key, bound);
    } else {
      setContextEntry(resolved, key, value);
    }
  }
  return resolved;
}

/**
 * Decode the model's response into the plan wire shape.
 * Falls back to the outermost `{ ... "steps" ... }` span when the response
 * carries prose around the JSON.
 */
export function parsePlanResponse(response: string): PlanResponse {
  const excerpt = response.slice(0, RAW_EXCERPT_LENGTH);
  let data: unknown;

  try {
    data = JSON.parse(response);
  } catch {
    const match = PLAN_JSON_PATTERN.exec(response);
    if (match === null) {
      throw new PlanJsonNotFoundError(`LLM returned no JSON plan: ${excerpt}...`, excerpt);
    }
    try {
      data = JSON.parse(match[0]);
    } catch {
      throw new PlanJsonInvalidError(`LLM returned invalid JSON: ${excerpt}...`, excerpt);
    }
  }

  const parsed = PlanResponseSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const location = issue !== undefined && issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new PlanShapeError(
      `Invalid plan structure at ${location}: ${issue?.message ?? 'unexpected value'}`,
      excerpt
    );
  }
  return parsed.data;
}

export class Planner {
  private readonly logger: Logger;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly defaultMaxSteps: number;

  constructor(
    private readonly textGenerator: TextGenerator,
    private readonly toolRegistry: ToolRegistry,
    options: PlannerOptions = {}
  ) {
    this.logger = createChildLogger({ service: 'Planner' });
    this.maxTokens = options.maxTokens ?? 2000;
    this.temperature = options.temperature ?? 0.1;
    this.defaultMaxSteps = options.defaultMaxSteps ?? 10;
  }

  /**
   * Plan, validate and run a goal. Validation and generation errors are thrown;
   * execution failures are recorded on the returned plan.
   */
  async execute(goal: string, context: ContextMap, options: ExecuteOptions = {}): Promise<Plan> {
    this.logger.info({ goal }, 'Planner executing goal');

    const plan = await this.generatePlan(goal, context, options.allowedTools, options.maxSteps);
    plan.status = 'running';

    try {
      this.validatePlan(plan, options.allowedTools);
    } catch (error) {
      plan.status = 'failed';
      this.logger.error({ error: errorMessage(error) }, 'Plan validation failed');
      throw error;
    }

    return this.executePlan(plan, options.onStep);
  }

  async generatePlan(
    goal: string,
    initialContext: ContextMap,
    allowedTools?: readonly string[],
    maxSteps: number = this.defaultMaxSteps
  ): Promise<Plan> {
    const tools = this.describeTools(allowedTools);
    const prompt = this.buildPlanningPrompt(goal, initialContext, tools, maxSteps);

    this.logger.info({ tools: tools.length, maxSteps }, 'Calling LLM to generate execution plan');
    const response = await this.textGenerator.complete(prompt, {
      maxTokens: this.maxTokens,
      temperature: this.temperature,
    });

    const planResponse = parsePlanResponse(response);
    if (planResponse.steps.length > maxSteps) {
      this.logger.warn({ steps: planResponse.steps.length, maxSteps }, 'Plan exceeds requested step ceiling');
    }

    const plan = createPlan(goal, planResponse.steps.map(createStep), initialContext);
    this.logger.info({ steps: plan.steps.length }, 'Generated plan');
    return plan;
  }

  /**
   * Catalogue of registered tools, restricted to the whitelist when one is given
   */
  describeTools(allowedTools?: readonly string[]): ToolSummary[] {
    const summaries: ToolSummary[] = [];
    for (const name of this.toolRegistry.listTools()) {
      if (!isAllowed(name, allowedTools)) {
        continue;
      }
      const tool = this.toolRegistry.getTool(name);
      if (tool !== undefined) {
        summaries.push({
          name: tool.name,
          description: tool.description,
          parameters: tool.inputSchema.properties,
        });
      }
    }
    return summaries;
  }

  buildPlanningPrompt(
    goal: string,
    context: ContextMap,
    tools: readonly ToolSummary[],
    maxSteps: number
  ): string {
    const toolsText = tools.map((tool) => `- ${tool.name}: ${tool.description}`).join('\n');
    const contextText = JSON.stringify(context, null, 2);

    return `You are a workflow planner that generates ONLY valid JSON output.

GOAL: ${goal}

AVAILABLE CONTEXT:
${contextText}

AVAILABLE TOOLS:
${toolsText}

INSTRUCTIONS:
1. Break down the goal into sequential steps (max ${maxSteps} steps)
2. Each step uses exactly ONE tool from available tools
3. Reference context variables using "$variable_name"
4. Output variable names should be descriptive

CRITICAL: You must respond with ONLY a valid JSON object, no other text.

OUTPUT FORMAT:
{
  "steps": [
    {
      "step_number": 1,
      "tool_name": "tool_name_here",
      "description": "What this step accomplishes",
      "inputs": {"param1": "value1", "param2": "$context_variable"},
      "output_variable": "descriptive_output_name"
    }
  ]
}

Respond ONLY with the JSON object, nothing else:`;
  }

  /**
   * Reject plans that reference unknown or disallowed tools, or whose steps
   * are structurally unusable. Throws PlanValidationError on the first problem.
   */
  validatePlan(plan: Plan, allowedTools?: readonly string[]): void {
    if (plan.steps.length === 0) {
      throw new PlanValidationError('Plan has no steps');
    }

    for (const step of plan.steps) {
      const n = step.stepNumber;

      if (!isAllowed(step.toolName, allowedTools)) {
        throw new PlanValidationError(
          `Step ${n}: Tool '${step.toolName}' not in allowed tools: ${(allowedTools ?? []).join(', ')}`,
          n
        );
      }

      const tool = this.toolRegistry.getTool(step.toolName);
      if (tool === undefined) {
        throw new PlanValidationError(`Step ${n}: Tool '${step.toolName}' not registered`, n);
      }

      if (!isContextMap(step.inputs)) {
        throw new PlanValidationError(`Step ${n}: inputs must be an object`, n);
      }

      if (step.outputVariable === '') {
        throw new PlanValidationError(`Step ${n}: output_variable is required`, n);
      }

      const inputs = step.inputs;
      const missing = (tool.inputSchema.required ?? []).find(
        (field) => !Object.prototype.hasOwnProperty.call(inputs, field)
      );
      if (missing !== undefined) {
        throw new PlanValidationError(`Step ${n}: Missing required field: ${missing}`, n);
      }
    }
  }

  async executePlan(plan: Plan, onStep?: StepHook): Promise<Plan> {
    const ordered = [...plan.steps].sort((a, b) => a.stepNumber - b.stepNumber);
    plan.status = 'running';

    for (const [index, step] of ordered.entries()) {
      if (onStep !== undefined) {
        await onStep(step, index, ordered.length);
      }

      this.logger.info({ step: step.stepNumber, tool: step.toolName }, `Executing step: ${step.description}`);
      step.status = 'running';

      try {
        const result = await this.runStep(step, plan.context);
        step.result = result;
        setContextEntry(plan.context, step.outputVariable, result);
        step.status = 'completed';
        this.logger.info({ step: step.stepNumber }, 'Step completed');
      } catch (error) {
        step.status = 'failed';
        step.error = errorMessage(error);
        plan.status = 'failed';
        this.logger.error({ step: step.stepNumber, error: step.error }, 'Step failed');
        return plan;
      }
    }

    plan.status = 'completed';
    this.logger.info('Plan completed successfully');
    return plan;
  }

  private async runStep(step: Step, context: ContextMap): Promise<ContextMap> {
    const tool = this.toolRegistry.getTool(step.toolName);
    if (tool === undefined) {
      throw new ToolExecutionError(step.toolName, `Tool not found: ${step.toolName}`);
    }
    if (!isContextMap(step.inputs)) {
      throw new ToolExecutionError(step.toolName, 'Step inputs must be an object');
    }

    const inputs = resolveInputs(step.inputs, context);

    const validation = tool.validateInputs(inputs);
    if (!validation.valid) {
      throw new ToolExecutionError(step.toolName, validation.error);
    }

    const result = await tool.execute(inputs);
    if (!result.success) {
      throw new ToolExecutionError(step.toolName, `Tool execution failed: ${result.error ?? 'unknown error'}`);
    }
    return result.outputs;
  }
}

function isAllowed(toolName: string, allowedTools?: readonly string[]): boolean {
  return allowedTools === undefined || allowedTools.length === 0 || allowedTools.includes(toolName);
}
