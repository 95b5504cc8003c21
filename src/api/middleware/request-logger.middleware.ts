/**
 * Request logging middleware
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createRequestLogger } from '../../utils/logger.js';

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header('X-Request-ID');
  const requestId = incoming !== undefined && incoming !== '' ? incoming : uuidv4();
  const startTime = Date.now();

  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  const reqLogger = createRequestLogger(requestId);
  reqLogger.debug({ method: req.method, url: req.url }, 'Incoming request');

  res.on('finish', () => {
    const logData = {
      method: req.method,
      url: req.url,
      statusCode: res.statusCode,
      duration: Date.now() - startTime,
    };

    if (res.statusCode >= 500) {
      reqLogger.error(logData, 'Request completed with server error');
    } else if (res.statusCode >= 400) {
      reqLogger.warn(logData, 'Request completed with client error');
    } else {
      reqLogger.info(logData, 'Request completed');
    }
  });

  next();
}
