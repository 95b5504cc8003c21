/**
 * Handler exports
 */

export { JobHandler } from './job.handler.js';
export { HealthHandler } from './health.handler.js';
