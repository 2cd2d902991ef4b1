import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MaintenanceScheduler, RETENTION_CRON } from '../../../src/scheduler/MaintenanceScheduler.js';
import type { JobReconciliationService } from '../../../src/services/JobReconciliationService.js';
import type { JobRetentionService } from '../../../src/services/JobRetentionService.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const cronMocks = vi.hoisted(() => {
  const stop = vi.fn();
  return {
    stop,
    schedule: vi.fn((_expression: string, _callback: () => unknown) => ({ stop })),
  };
});

vi.mock('node-cron', () => ({
  default: { schedule: cronMocks.schedule },
}));

describe('MaintenanceScheduler', () => {
  const reconcile = vi.fn<JobReconciliationService['reconcile']>();
  const cleanupOlderThan = vi.fn<JobRetentionService['cleanupOlderThan']>();

  function createScheduler() {
    const reconciliation: Pick<JobReconciliationService, 'reconcile'> = { reconcile };
    const retention: Pick<JobRetentionService, 'cleanupOlderThan'> = { cleanupOlderThan };
    return new MaintenanceScheduler(
      { JOB_RECONCILE_INTERVAL_MINUTES: 5, JOB_RETENTION_DAYS: 7 },
      reconciliation,
      retention
    );
  }

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('schedules reconciliation and daily retention once', () => {
    const scheduler = createScheduler();

    scheduler.start();
    scheduler.start();

    expect(cronMocks.schedule).toHaveBeenCalledTimes(2);
    expect(cronMocks.schedule.mock.calls.map(([expression]) => expression)).toEqual([
      '*/5 * * * *',
      RETENTION_CRON,
    ]);

    scheduler.stop();
    expect(cronMocks.stop).toHaveBeenCalledTimes(2);
  });

  it('runs retention with the configured window', () => {
    cleanupOlderThan.mockReturnValue(3);

    createScheduler().runRetention();

    expect(cleanupOlderThan).toHaveBeenCalledWith(7);
  });

  it('logs a failed reconciliation pass instead of throwing', async () => {
    reconcile.mockRejectedValue(new Error('queue offline'));

    await createScheduler().runReconciliation();

    expect(loggerMock.logger.error).toHaveBeenCalledWith('Job reconciliation failed', {
      error: 'queue offline',
    });
  });

  it('skips a tick while the previous pass is still running', async () => {
    let finish: () => void = () => undefined;
    reconcile.mockImplementation(
      () =>
        new Promise((resolve) => {
          finish = () =>
            resolve({ orphansRepublished: 0, staleRepublished: 0, publishFailures: 0 });
        })
    );
    const scheduler = createScheduler();

    const first = scheduler.runReconciliation();
    await scheduler.runReconciliation();
    finish();
    await first;

    expect(reconcile).toHaveBeenCalledTimes(1);
  });
});
