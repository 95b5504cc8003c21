/**
 * Job model tests
 */

import { Job, formatLogLine } from '../../models/job.model.js';
import { InvalidJobStateError } from '../../utils/errors.js';

function newJob(): Job {
  return new Job({ jobId: 'job_000000000001', workflowId: 'planner', input: { goal: 'x' } });
}

describe('formatLogLine', () => {
  it('should prefix the UTC time of day', () => {
    expect(formatLogLine('hello', new Date('2024-03-05T09:08:07.123Z'))).toBe('[09:08:07] hello');
  });
});

describe('Job', () => {
  it('should start PENDING with empty progress and logs', () => {
    const job = newJob();

    expect(job.status).toBe('PENDING');
    expect(job.progress).toBe(0);
    expect(job.currentStep).toBeNull();
    expect(job.logs).toEqual([]);
    expect(job.completedAt).toBeNull();
    expect(job.variant).toBe(1);
  });

  describe('setProgress', () => {
    it.each([
      [-0.5, 0],
      [0, 0],
      [0.25, 0.25],
      [1, 1],
      [3, 1],
      [Number.POSITIVE_INFINITY, 1],
      [Number.NEGATIVE_INFINITY, 0],
    ])('should clamp %p to %p', (input, expected) => {
      const job = newJob();
      job.setProgress(input);
      expect(job.progress).toBe(expected);
    });

    it('should keep the previous value for NaN', () => {
      const job = newJob();
      job.setProgress(0.4);
      job.setProgress(Number.NaN);
      expect(job.progress).toBe(0.4);
    });

    it('should set the step label only when non-empty', () => {
      const job = newJob();
      job.setProgress(0.1, 'Fetching');
      job.setProgress(0.2, '');
      expect(job.currentStep).toBe('Fetching');
    });
  });

  it('should append logs in order', () => {
    const job = newJob();
    job.addLog('one');
    job.addLog('two');

    expect(job.logs).toHaveLength(2);
    expect(job.logs[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] one$/);
    expect(job.logs[1]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] two$/);
  });

  it('should refuse to start twice', () => {
    const job = newJob();
    job.markRunning();
    expect(() => job.markRunning()).toThrow(InvalidJobStateError);
  });

  it('should force progress to 1 and clear the step on completion', () => {
    const job = newJob();
    job.markRunning();
    job.setProgress(0.5, 'Halfway');
    job.complete({ answer: 42 });

    expect(job.status).toBe('COMPLETE');
    expect(job.progress).toBe(1);
    expect(job.currentStep).toBeNull();
    expect(job.result).toEqual({ answer: 42 });
    expect(job.error).toBeNull();
    expect(job.completedAt).toBeInstanceOf(Date);
  });

  it('should record the error and an ERROR log line on failure', () => {
    const job = newJob();
    job.markRunning();
    job.fail('boom');

    expect(job.status).toBe('FAILED');
    expect(job.error).toBe('boom');
    expect(job.result).toBeNull();
    expect(job.logs[job.logs.length - 1]).toMatch(/\] ERROR: boom$/);
  });

  it('should log cancellation', () => {
    const job = newJob();
    job.markRunning();
    job.cancel();

    expect(job.status).toBe('CANCELLED');
    expect(job.logs[job.logs.length - 1]).toMatch(/\] Job cancelled by user$/);
  });

  it('should allow exactly one terminal transition', () => {
    const job = newJob();
    job.markRunning();
    job.complete({});
    const completedAt = job.completedAt;

    expect(() => job.fail('late')).toThrow(InvalidJobStateError);
    expect(() => job.cancel()).toThrow(InvalidJobStateError);
    expect(job.status).toBe('COMPLETE');
    expect(job.completedAt).toBe(completedAt);
  });

  it('should clone without sharing mutable state', () => {
    const job = newJob();
    job.addLog('first');
    const copy = job.clone();
    copy.addLog('second');
    copy.addArtifact({ type: 'text', label: 'Notes', path: 'job/notes.txt' });

    expect(job.logs).toHaveLength(1);
    expect(job.artifacts).toHaveLength(0);
    expect(copy.logs).toHaveLength(2);
  });

  it('should serialize to the externalized view', () => {
    const job = newJob();
    const view = job.toJSON();

    expect(view).toMatchObject({
      jobId: 'job_000000000001',
      workflowId: 'planner',
      status: 'PENDING',
      progress: 0,
      input: { goal: 'x' },
    });
    expect(view.completedAt).toBeUndefined();

    job.markRunning();
    job.complete({});
    expect(typeof job.toJSON().completedAt).toBe('string');
  });
});
