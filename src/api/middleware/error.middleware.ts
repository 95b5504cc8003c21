/**
 * Error handling middleware
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createChildLogger } from '../../utils/logger.js';
import { isPlanRunnerError } from '../../utils/errors.js';
import type { ApiResponse } from '../../types/api.js';
import { responseMeta } from './response.js';

export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const logger = createChildLogger({ middleware: 'error' });
  const requestId = req.requestId ?? 'unknown';

  if (error instanceof ZodError) {
    const details = error.errors.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
    }));

    logger.warn({ requestId, errors: details }, 'Validation error');

    const response: ApiResponse<never> = {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: { errors: details },
      },
      meta: responseMeta(req),
    };

    res.status(400).json(response);
    return;
  }

  if (isPlanRunnerError(error)) {
    logger.warn({ requestId, code: error.code, message: error.message }, 'Request failed');

    const response: ApiResponse<never> = {
      success: false,
      error: error.toJSON(),
      meta: responseMeta(req),
    };

    res.status(error.statusCode).json(response);
    return;
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    const response: ApiResponse<never> = {
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
      meta: responseMeta(req),
    };
    res.status(400).json(response);
    return;
  }

  logger.error({ requestId, err: error }, 'Unhandled error');

  const response: ApiResponse<never> = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
    meta: responseMeta(req),
  };

  res.status(500).json(response);
}
