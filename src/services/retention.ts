/**
 * Retention sweep: evicts expired job records and their artifact directories
 */

import { createChildLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { JobStore } from '../repositories/job.store.js';
import type { ArtifactStore } from './artifact-store.js';

/**
 * @returns IDs of the jobs removed from the store
 */
export async function sweepExpiredJobs(
  jobStore: JobStore,
  artifactStore: ArtifactStore,
  retentionHours: number,
  now: Date = new Date()
): Promise<string[]> {
  const logger = createChildLogger({ service: 'Retention' });
  const removed = jobStore.removeOlderThan(retentionHours, now);

  for (const jobId of removed) {
    try {
      await artifactStore.removeJob(jobId);
    } catch (error) {
      logger.warn({ jobId, error: errorMessage(error) }, 'Failed to remove artifacts of expired job');
    }
  }

  return removed;
}
