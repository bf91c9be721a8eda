import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getJobDefinitions, registerJob, stopScheduler, triggerJob } from './scheduler';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  stopScheduler();
  vi.restoreAllMocks();
});

describe('registerJob', () => {
  it('records each job once', () => {
    const task = vi.fn(async () => undefined);
    registerJob('sweep', '*/5 * * * *', task);
    registerJob('sweep', '*/10 * * * *', task);

    expect(getJobDefinitions().map((job) => [job.name, job.schedule, job.enabled])).toEqual([
      ['sweep', '*/5 * * * *', true]
    ]);
  });

  it('rejects an invalid cron expression', () => {
    expect(() => registerJob('broken', 'every five minutes', async () => undefined)).toThrow(
      'Invalid cron expression for job "broken": every five minutes'
    );
    expect(getJobDefinitions()).toEqual([]);
  });
});

describe('triggerJob', () => {
  it('runs a registered job on demand, even when disabled', async () => {
    const task = vi.fn(async () => undefined);
    registerJob('reconcile', '30 2 * * *', task, false);
    await triggerJob('reconcile');
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('raises the failure of the job', async () => {
    registerJob('failing', '* * * * *', async () => {
      throw new Error('sweep failed');
    });
    await expect(triggerJob('failing')).rejects.toThrow('sweep failed');
  });

  it('reports an unknown job', async () => {
    await expect(triggerJob('missing')).rejects.toThrow('Job "missing" not found');
  });
});
