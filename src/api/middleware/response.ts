/**
 * Response envelope helpers
 */

import type { Request, Response } from 'express';
import type { ApiResponse, ResponseMeta } from '../../types/api.js';

export function responseMeta(req: Request): ResponseMeta {
  return {
    requestId: req.requestId ?? 'unknown',
    timestamp: new Date().toISOString(),
  };
}

export function sendData<T>(req: Request, res: Response, status: number, data: T): void {
  const response: ApiResponse<T> = {
    success: true,
    data,
    meta: responseMeta(req),
  };
  res.status(status).json(response);
}
