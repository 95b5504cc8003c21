/**
 * Job runner tests
 */

import { JobRunner, type WorkflowBody } from '../../services/job-runner.js';
import { JobStore } from '../../repositories/job.store.js';
import {
  InvalidJobStateError,
  NotFoundError,
  ServiceUnavailableError,
} from '../../utils/errors.js';
import { deferred, flush, waitForStatus } from '../helpers/async.js';

function messages(store: JobStore, jobId: string): string[] {
  return (store.get(jobId)?.logs ?? []).map((line) => line.replace(/^\[\d{2}:\d{2}:\d{2}\] /, ''));
}

describe('JobRunner', () => {
  let store: JobStore;
  let runner: JobRunner;

  beforeEach(() => {
    store = new JobStore();
    runner = new JobRunner(store, { maxConcurrent: 2 });
  });

  afterEach(async () => {
    await runner.shutdown(true);
  });

  it('should run a workflow to COMPLETE', async () => {
    const job = store.create('planner');
    const body: WorkflowBody = (current, log) => {
      current.setProgress(0.5, 'Halfway');
      log('working');
      return { answer: 42 };
    };

    expect(runner.submit(job, body)).toBe(job.jobId);
    await waitForStatus(store, job.jobId, ['COMPLETE']);

    const stored = store.get(job.jobId);
    expect(stored?.result).toEqual({ answer: 42 });
    expect(stored?.progress).toBe(1);
    expect(stored?.currentStep).toBeNull();
    expect(messages(store, job.jobId)).toEqual(['Starting workflow: planner', 'working', 'Workflow complete']);
    expect(runner.activeJobIds()).toEqual([]);
  });

  it('should persist progress on each log call', async () => {
    const job = store.create('planner');
    const gate = deferred();

    runner.submit(job, async (current, log) => {
      current.setProgress(0.25, 'Fetching');
      log('fetching');
      await gate.promise;
      return {};
    });

    await waitForStatus(store, job.jobId, ['RUNNING']);
    await flush();
    expect(store.get(job.jobId)?.progress).toBe(0.25);
    expect(store.get(job.jobId)?.currentStep).toBe('Fetching');

    gate.resolve();
    await waitForStatus(store, job.jobId, ['COMPLETE']);
  });

  it('should record the error message when the workflow throws', async () => {
    const job = store.create('planner');

    runner.submit(job, () => Promise.reject(new Error('kaput')));
    await waitForStatus(store, job.jobId, ['FAILED']);

    const stored = store.get(job.jobId);
    expect(stored?.error).toBe('kaput');
    expect(stored?.result).toBeNull();
    expect(messages(store, job.jobId)).toEqual(['Starting workflow: planner', 'ERROR: kaput']);
  });

  it('should cancel at the next log checkpoint', async () => {
    const job = store.create('planner');
    const gate = deferred();

    runner.submit(job, async (_current, log) => {
      await gate.promise;
      log('should not be recorded');
      return { unreachable: true };
    });

    await waitForStatus(store, job.jobId, ['RUNNING']);
    expect(runner.cancel(job.jobId)).toBe(true);
    expect(runner.isCancellationRequested(job.jobId)).toBe(true);

    gate.resolve();
    await waitForStatus(store, job.jobId, ['CANCELLED']);

    expect(messages(store, job.jobId)).toEqual(['Starting workflow: planner', 'Job cancelled by user']);
    expect(store.get(job.jobId)?.result).toBeNull();
    expect(runner.isCancellationRequested(job.jobId)).toBe(false);
  });

  it('should cancel when the signal is set by the time the workflow returns', async () => {
    const job = store.create('planner');
    const gate = deferred();

    runner.submit(job, async () => {
      await gate.promise;
      return { ignored: true };
    });

    await waitForStatus(store, job.jobId, ['RUNNING']);
    runner.cancel(job.jobId);
    gate.resolve();

    await waitForStatus(store, job.jobId, ['CANCELLED']);
  });

  it('should expose the cancellation signal to the workflow', async () => {
    const job = store.create('planner');
    const gate = deferred();
    let observed = false;

    runner.submit(job, async (_current, _log, signal) => {
      await gate.promise;
      observed = signal.aborted;
      return {};
    });

    await waitForStatus(store, job.jobId, ['RUNNING']);
    runner.cancel(job.jobId);
    gate.resolve();
    await waitForStatus(store, job.jobId, ['CANCELLED']);

    expect(observed).toBe(true);
  });

  it('should cancel when the workflow aborts on the signal itself', async () => {
    const job = store.create('planner');
    const gate = deferred();

    runner.submit(job, async (_current, _log, signal) => {
      await gate.promise;
      signal.throwIfAborted();
      return {};
    });

    await waitForStatus(store, job.jobId, ['RUNNING']);
    runner.cancel(job.jobId);
    gate.resolve();
    await waitForStatus(store, job.jobId, ['CANCELLED', 'FAILED']);

    const stored = store.get(job.jobId);
    expect(stored?.status).toBe('CANCELLED');
    expect(stored?.error).toBeNull();
    expect(messages(store, job.jobId).at(-1)).toBe('Job cancelled by user');
  });

  it('should keep COMPLETE when cancellation arrives after the workflow returned', async () => {
    const job = store.create('planner');

    runner.submit(job, () => ({ done: true }));
    await waitForStatus(store, job.jobId, ['COMPLETE']);

    expect(() => runner.cancel(job.jobId)).toThrow(InvalidJobStateError);
    expect(store.get(job.jobId)?.status).toBe('COMPLETE');
    expect(runner.activeJobIds()).toEqual([]);
  });

  it('should reject cancellation of unknown and PENDING jobs', async () => {
    const single = new JobRunner(store, { maxConcurrent: 1 });
    const gate = deferred();
    const first = store.create('planner');
    const second = store.create('planner');

    single.submit(first, async () => {
      await gate.promise;
      return {};
    });
    single.submit(second, () => ({}));
    await waitForStatus(store, first.jobId, ['RUNNING']);

    expect(() => single.cancel('job_unknown')).toThrow(NotFoundError);
    expect(() => single.cancel(second.jobId)).toThrow('is not running (status: PENDING)');

    gate.resolve();
    await waitForStatus(store, second.jobId, ['COMPLETE']);
    await single.shutdown(true);
  });

  it('should return false when the running job is not owned by this runner', async () => {
    const other = new JobRunner(store, { maxConcurrent: 1 });
    const gate = deferred();
    const job = store.create('planner');

    runner.submit(job, async () => {
      await gate.promise;
      return {};
    });
    await waitForStatus(store, job.jobId, ['RUNNING']);

    expect(other.cancel(job.jobId)).toBe(false);

    gate.resolve();
    await waitForStatus(store, job.jobId, ['COMPLETE']);
    await other.shutdown(true);
  });

  it('should refuse to submit a job twice', () => {
    const job = store.create('planner');
    const gate = deferred();
    runner.submit(job, async () => {
      await gate.promise;
      return {};
    });

    expect(() => runner.submit(job, () => ({}))).toThrow(InvalidJobStateError);
    gate.resolve();
  });

  it('should never run more than maxConcurrent jobs at once', async () => {
    const gates = [deferred(), deferred(), deferred()];
    const jobs = gates.map((gate) => {
      const job = store.create('planner');
      runner.submit(job, async () => {
        await gate.promise;
        return {};
      });
      return job;
    });

    const samples: number[] = [];
    const sample = async (): Promise<void> => {
      await flush();
      samples.push(store.count('RUNNING'));
    };

    await sample();
    expect(store.count('PENDING')).toBe(1);

    gates[0]?.resolve();
    await sample();
    gates[1]?.resolve();
    await sample();
    gates[2]?.resolve();
    await sample();

    for (const job of jobs) {
      await waitForStatus(store, job.jobId, ['COMPLETE']);
    }
    expect(Math.max(...samples)).toBeLessThanOrEqual(2);
    expect(samples[0]).toBe(2);
  });

  it('should cancel outstanding jobs on shutdown and refuse new ones', async () => {
    const single = new JobRunner(store, { maxConcurrent: 1 });
    const gate = deferred();
    const running = store.create('planner');
    const queued = store.create('planner');
    let queuedBodyRan = false;

    single.submit(running, async (_current, log) => {
      await gate.promise;
      log('after shutdown');
      return {};
    });
    single.submit(queued, () => {
      queuedBodyRan = true;
      return {};
    });
    await waitForStatus(store, running.jobId, ['RUNNING']);

    const stopped = single.shutdown(true);
    gate.resolve();
    await stopped;

    expect(store.get(running.jobId)?.status).toBe('CANCELLED');
    expect(store.get(queued.jobId)?.status).toBe('CANCELLED');
    expect(queuedBodyRan).toBe(false);
    expect(() => single.submit(store.create('planner'), () => ({}))).toThrow(ServiceUnavailableError);
  });
});
