/**
 * Repository exports
 */

export { JobStore, generateJobId } from './job.store.js';
