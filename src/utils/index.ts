/**
 * Utility module exports
 */

export { getConfig, resetConfig } from './config.js';
export type { Config } from './config.js';

export {
  getLogger,
  createChildLogger,
  createRequestLogger,
  createJobLogger,
  resetLogger,
} from './logger.js';
export type { LogContext } from './logger.js';

export {
  PlanRunnerError,
  ValidationError,
  NotFoundError,
  InvalidJobStateError,
  ServiceUnavailableError,
  InternalError,
  JobCancelledError,
  JobExecutionError,
  PlanValidationError,
  MalformedPlanError,
  PlanJsonNotFoundError,
  PlanJsonInvalidError,
  PlanShapeError,
  VariableNotFoundError,
  ToolExecutionError,
  isPlanRunnerError,
  errorMessage,
} from './errors.js';
