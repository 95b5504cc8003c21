/**
 * Pino logging for planrunner
 *
 * One root logger per process. Components log through children that carry
 * their own bindings (service, repository, tool, middleware) and, where work
 * is scoped to a request or job, its ID.
 */

import pino from 'pino';
import { getConfig } from './config.js';

export interface LogContext {
  readonly service?: string;
  readonly repository?: string;
  readonly tool?: string;
  readonly middleware?: string;
  readonly requestId?: string;
  readonly jobId?: string;
  readonly workflowId?: string;
  readonly [key: string]: unknown;
}

const REDACTED_PATHS = [
  'req.headers.authorization',
  'headers.Authorization',
  'llm.apiKey',
  'apiKey',
  'password',
  'secret',
  'token',
];

function prettyTransport(): pino.TransportSingleOptions {
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

function createLogger(): pino.Logger {
  const config = getConfig();
  const pretty = config.log.pretty && config.nodeEnv !== 'production';

  return pino({
    level: config.log.level,
    base: {
      app: 'planrunner',
      version: process.env['npm_package_version'] ?? '1.0.0',
      env: config.nodeEnv,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: { paths: REDACTED_PATHS, remove: true },
    ...(pretty && { transport: prettyTransport() }),
  });
}

let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (loggerInstance === null) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

export function createChildLogger(context: LogContext, parent: pino.Logger = getLogger()): pino.Logger {
  return parent.child(context);
}

export function createRequestLogger(requestId: string): pino.Logger {
  return createChildLogger({ requestId });
}

/**
 * Logger for one job's execution, nested under the component that runs it
 */
export function createJobLogger(parent: pino.Logger, jobId: string, workflowId: string): pino.Logger {
  return createChildLogger({ jobId, workflowId }, parent);
}

// For tests: the next getLogger call rebuilds from current config
export function resetLogger(): void {
  loggerInstance = null;
}
