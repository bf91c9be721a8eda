import { describe, expect, it } from 'vitest';
import { getJobSchedules, resolveSchedulerStartupMode } from './schedulerStartup';

describe('resolveSchedulerStartupMode', () => {
  it('keeps the scheduler off unless in-process jobs are requested', () => {
    expect(resolveSchedulerStartupMode({ env: {}, nodeEnv: 'production' })).toEqual({
      runInProcessJobs: false,
      schedulerEnabled: false
    });
  });

  it('needs an explicit opt-in during development', () => {
    expect(resolveSchedulerStartupMode({ env: { RUN_INPROCESS_JOBS: 'true' }, nodeEnv: 'development' })).toEqual({
      runInProcessJobs: true,
      schedulerEnabled: false
    });
    expect(
      resolveSchedulerStartupMode({
        env: { RUN_INPROCESS_JOBS: 'yes', ENABLE_SCHEDULER: 'on' },
        nodeEnv: 'development'
      }).schedulerEnabled
    ).toBe(true);
  });

  it('runs the scheduler elsewhere once in-process jobs are on', () => {
    expect(resolveSchedulerStartupMode({ env: { RUN_INPROCESS_JOBS: '1', NODE_ENV: 'production' } })).toEqual({
      runInProcessJobs: true,
      schedulerEnabled: true
    });
  });
});

describe('getJobSchedules', () => {
  it('defaults and overrides the cron expressions', () => {
    expect(getJobSchedules({})).toEqual({ reservationExpiry: '*/5 * * * *', ledgerReconcile: '30 2 * * *' });
    expect(getJobSchedules({ RESERVATION_EXPIRY_CRON: ' */1 * * * * ', LEDGER_RECONCILE_CRON: '' })).toEqual({
      reservationExpiry: '*/1 * * * *',
      ledgerReconcile: '30 2 * * *'
    });
  });
});
