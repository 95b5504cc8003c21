/**
 * Worker Pool - bounded concurrency for long-running async work
 *
 * At most `maxConcurrent` tasks are in flight. Further submissions are queued
 * FIFO and started as slots are released; submitting never blocks the caller.
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger.js';
import { ServiceUnavailableError } from '../utils/errors.js';

export interface WorkerPoolStats {
  readonly active: number;
  readonly queued: number;
  readonly maxConcurrent: number;
}

export class WorkerPool {
  private readonly logger: Logger;
  private readonly queue: Array<() => void> = [];
  private readonly drainWaiters: Array<() => void> = [];
  private active = 0;
  private closed = false;

  constructor(
    readonly maxConcurrent: number,
    name = 'default'
  ) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.logger = createChildLogger({ service: 'WorkerPool', pool: name });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue a task. The returned promise settles with the task's outcome.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new ServiceUnavailableError('Worker pool is closed'));
    }

    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.active++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => this.release());
      };

      if (this.active < this.maxConcurrent) {
        start();
      } else {
        this.queue.push(start);
        this.logger.debug(
          { active: this.active, queued: this.queue.length },
          'Pool at capacity, task queued'
        );
      }
    });
  }

  stats(): WorkerPoolStats {
    return {
      active: this.active,
      queued: this.queue.length,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Resolve once nothing is running or queued
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  /**
   * Refuse further submissions. Tasks already queued still run.
   */
  close(): void {
    this.closed = true;
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private release(): void {
    this.active--;

    const next = this.queue.shift();
    if (next !== undefined) {
      next();
      return;
    }

    if (this.isIdle()) {
      const waiters = this.drainWaiters.splice(0, this.drainWaiters.length);
      for (const resolve of waiters) {
        resolve();
      }
    }
  }
}
