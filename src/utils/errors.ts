/**
 * Custom error classes for the planrunner service
 */

export abstract class PlanRunnerError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: string; message: string; details: Record<string, unknown> | undefined } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class ValidationError extends PlanRunnerError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;
}

export class NotFoundError extends PlanRunnerError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
}

export class InvalidJobStateError extends PlanRunnerError {
  readonly code = 'INVALID_STATE';
  readonly statusCode = 409;
}

export class ServiceUnavailableError extends PlanRunnerError {
  readonly code = 'SERVICE_UNAVAILABLE';
  readonly statusCode = 503;
}

export class InternalError extends PlanRunnerError {
  readonly code = 'INTERNAL_ERROR';
  readonly statusCode = 500;
}

/**
 * Raised inside a workflow body when its job's cancellation signal is observed.
 * The runner records the job as CANCELLED, never FAILED.
 */
export class JobCancelledError extends PlanRunnerError {
  readonly code = 'JOB_CANCELLED';
  readonly statusCode = 409;
  readonly jobId: string;

  constructor(jobId: string, message = 'Job cancelled') {
    super(message, { jobId });
    this.jobId = jobId;
  }
}

export class JobExecutionError extends PlanRunnerError {
  readonly code = 'JOB_EXECUTION_ERROR';
  readonly statusCode = 500;
  readonly jobId: string;

  constructor(jobId: string, message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.jobId = jobId;
  }
}

export class PlanValidationError extends PlanRunnerError {
  readonly code = 'PLAN_VALIDATION_ERROR';
  readonly statusCode = 422;
  readonly stepNumber: number | null;

  constructor(message: string, stepNumber: number | null = null) {
    super(message, stepNumber !== null ? { stepNumber } : undefined);
    this.stepNumber = stepNumber;
  }
}

/**
 * The LLM response could not be turned into a plan.
 * Subclasses tell apart where decoding gave up.
 */
export abstract class MalformedPlanError extends PlanRunnerError {
  readonly statusCode = 502;
  readonly rawExcerpt: string;

  constructor(message: string, rawExcerpt: string) {
    super(message, { rawExcerpt });
    this.rawExcerpt = rawExcerpt;
  }
}

/** Neither strict parsing nor recovery located a JSON object with "steps". */
export class PlanJsonNotFoundError extends MalformedPlanError {
  readonly code = 'PLAN_JSON_NOT_FOUND';
}

/** A "steps" object was extracted from the response but is not valid JSON. */
export class PlanJsonInvalidError extends MalformedPlanError {
  readonly code = 'PLAN_JSON_INVALID';
}

/** Valid JSON whose structure is not a plan. */
export class PlanShapeError extends MalformedPlanError {
  readonly code = 'PLAN_SHAPE_INVALID';
}

export class VariableNotFoundError extends PlanRunnerError {
  readonly code = 'VARIABLE_NOT_FOUND';
  readonly statusCode = 422;
  readonly variableName: string;

  constructor(variableName: string) {
    super(`Variable '${variableName}' not found in context`, { variableName });
    this.variableName = variableName;
  }
}

export class ToolExecutionError extends PlanRunnerError {
  readonly code = 'TOOL_EXECUTION_FAILED';
  readonly statusCode = 500;
  readonly toolName: string;

  constructor(toolName: string, message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.toolName = toolName;
  }
}

/**
 * Type guard to check if error is a PlanRunnerError
 */
export function isPlanRunnerError(error: unknown): error is PlanRunnerError {
  return error instanceof PlanRunnerError;
}

/**
 * Human-readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
