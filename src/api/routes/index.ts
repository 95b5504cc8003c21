/**
 * Route exports
 */

export { createJobRouter } from './job.routes.js';
export { createHealthRouter, createToolsRouter } from './health.routes.js';
