/**
 * API type definitions for HTTP request/response handling
 */

export interface ApiResponse<T> {
  readonly success: boolean;
  readonly data?: T | undefined;
  readonly error?: ApiError | undefined;
  readonly meta?: ResponseMeta | undefined;
}

export interface ApiError {
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown> | undefined;
}

export interface ResponseMeta {
  readonly requestId: string;
  readonly timestamp: string;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Set by the request logger middleware */
      requestId?: string;
    }
  }
}

export interface HealthCheckResponse {
  readonly status: 'healthy' | 'degraded' | 'unhealthy';
  readonly version: string;
  readonly uptime: number;
  readonly checks: Record<string, HealthCheck>;
}

export interface HealthCheck {
  readonly status: 'pass' | 'warn' | 'fail';
  readonly latencyMs?: number | undefined;
  readonly message?: string | undefined;
}

export interface ListResponse<T> {
  readonly items: ReadonlyArray<T>;
  readonly total: number;
}
