import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { Env } from '../infra/env.js';
import type { JobReconciliationService } from '../services/JobReconciliationService.js';
import type { JobRetentionService } from '../services/JobRetentionService.js';

export const RETENTION_CRON = '0 3 * * *';

/**
 * MaintenanceScheduler - periodic reconciliation and retention using node-cron
 */
export class MaintenanceScheduler {
  private tasks: ScheduledTask[] = [];
  private reconciling = false;

  constructor(
    private env: Pick<Env, 'JOB_RECONCILE_INTERVAL_MINUTES' | 'JOB_RETENTION_DAYS'>,
    private reconciliation: Pick<JobReconciliationService, 'reconcile'>,
    private retention: Pick<JobRetentionService, 'cleanupOlderThan'>
  ) {}

  start(): void {
    if (this.tasks.length > 0) {
      return;
    }

    const reconcileExpression = `*/${this.env.JOB_RECONCILE_INTERVAL_MINUTES} * * * *`;
    this.tasks.push(
      cron.schedule(reconcileExpression, async () => {
        await this.runReconciliation();
      }),
      cron.schedule(RETENTION_CRON, () => {
        this.runRetention();
      })
    );

    logger.info('MaintenanceScheduler started', {
      reconcileExpression,
      retentionExpression: RETENTION_CRON,
      retentionDays: this.env.JOB_RETENTION_DAYS,
    });
  }

  stop(): void {
    if (this.tasks.length === 0) {
      return;
    }
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
    logger.info('MaintenanceScheduler stopped');
  }

  /**
   * Skips a tick while the previous pass is still publishing
   */
  async runReconciliation(): Promise<void> {
    if (this.reconciling) {
      logger.info('Reconciliation skipped - previous pass still running');
      return;
    }

    this.reconciling = true;
    try {
      await this.reconciliation.reconcile();
    } catch (error) {
      logger.error('Job reconciliation failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.reconciling = false;
    }
  }

  runRetention(): void {
    try {
      this.retention.cleanupOlderThan(this.env.JOB_RETENTION_DAYS);
    } catch (error) {
      logger.error('Job retention cleanup failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
