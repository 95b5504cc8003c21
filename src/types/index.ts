/**
 * Type exports
 */

export * from './context.js';
export * from './job.js';
export * from './plan.js';
export * from './tools.js';
export * from './llm.js';
export * from './api.js';
