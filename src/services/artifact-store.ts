/**
 * Artifact Store - job output files on local disk
 *
 * Files live under `<basePath>/<jobId>/<filename>`. Artifact paths recorded on
 * jobs are relative to basePath.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import type { ContextValue } from '../types/context.js';
import type { Artifact, ArtifactType } from '../types/job.js';

const PREVIEW_LENGTH = 200;
const PREVIEWABLE: ReadonlySet<ArtifactType> = new Set<ArtifactType>(['text', 'json', 'csv']);

export class ArtifactStore {
  private readonly logger: Logger;
  private readonly root: string;

  constructor(basePath: string) {
    this.root = path.resolve(basePath);
    this.logger = createChildLogger({ service: 'ArtifactStore' });
  }

  get basePath(): string {
    return this.root;
  }

  /**
   * Absolute path for a job's file. Rejects names that escape the job directory.
   */
  resolve(jobId: string, filename: string): string {
    const jobDir = path.resolve(this.root, jobId);
    if (path.dirname(jobDir) !== this.root) {
      throw new ValidationError(`Invalid job ID for artifact path: ${jobId}`, { jobId });
    }

    const target = path.resolve(jobDir, filename);
    if (!target.startsWith(jobDir + path.sep)) {
      throw new ValidationError(`Invalid artifact filename: ${filename}`, { jobId, filename });
    }
    return target;
  }

  async save(
    jobId: string,
    filename: string,
    content: string | Buffer,
    type: ArtifactType,
    label: string
  ): Promise<Artifact> {
    const target = this.resolve(jobId, filename);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);

    const relative = path.relative(this.root, target).split(path.sep).join('/');
    this.logger.debug({ jobId, path: relative, type }, 'Artifact written');

    if (typeof content === 'string' && PREVIEWABLE.has(type)) {
      return { type, label, path: relative, preview: content.slice(0, PREVIEW_LENGTH) };
    }
    return { type, label, path: relative };
  }

  async saveJson(jobId: string, filename: string, value: ContextValue, label: string): Promise<Artifact> {
    return this.save(jobId, filename, JSON.stringify(value, null, 2), 'json', label);
  }

  async read(jobId: string, filename: string): Promise<Buffer> {
    return readFile(this.resolve(jobId, filename));
  }

  /**
   * Remove every file written for a job
   */
  async removeJob(jobId: string): Promise<void> {
    const jobDir = path.resolve(this.root, jobId);
    if (path.dirname(jobDir) !== this.root) {
      throw new ValidationError(`Invalid job ID for artifact path: ${jobId}`, { jobId });
    }
    await rm(jobDir, { recursive: true, force: true });
  }
}
