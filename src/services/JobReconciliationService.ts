import type { Job } from '../domain/entities/Job.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { TaskQueue } from '../infra/queue/TaskQueue.js';
import { logger } from '../infra/logger.js';

export interface ReconcileResult {
  orphansRepublished: number;
  staleRepublished: number;
  publishFailures: number;
}

/**
 * JobReconciliationService - puts stuck jobs back on the queue
 *
 * Orphans are pending jobs whose submission never published a task. Stale jobs
 * are running jobs whose worker stopped heartbeating; each is requeued at most
 * once per stale window. A duplicate message is harmless: only one delivery can
 * win the claim.
 */
export class JobReconciliationService {
  private clock: () => Date;

  constructor(
    private jobRepo: JobRepository,
    private queue: TaskQueue,
    private options: {
      queueName: string;
      orphanAfterMs: number;
      staleAfterMs: number;
      clock?: () => Date;
    }
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async reconcile(): Promise<ReconcileResult> {
    const now = this.clock().getTime();
    const orphans = this.jobRepo.listUnpublishedPending(new Date(now - this.options.orphanAfterMs));
    const stale = this.jobRepo.listStaleRunning(new Date(now - this.options.staleAfterMs));

    const result: ReconcileResult = { orphansRepublished: 0, staleRepublished: 0, publishFailures: 0 };

    for (const job of orphans) {
      if (await this.republish(job, 'orphan')) {
        this.jobRepo.markPublished(job.id, this.clock());
        result.orphansRepublished += 1;
      } else {
        result.publishFailures += 1;
      }
    }

    for (const job of stale) {
      if (await this.republish(job, 'stale')) {
        this.jobRepo.markRequeued(job.id, this.clock());
        result.staleRepublished += 1;
      } else {
        result.publishFailures += 1;
      }
    }

    if (orphans.length > 0 || stale.length > 0) {
      logger.info('Job reconciliation finished', { ...result });
    }
    return result;
  }

  private async republish(job: Job, reason: 'orphan' | 'stale'): Promise<boolean> {
    try {
      await this.queue.publish(this.options.queueName, {
        jobId: job.id,
        ownerId: job.ownerId,
        input: job.input,
        envContext: { ...job.envContext },
      });
      logger.info('Job republished', { jobId: job.id, reason });
      return true;
    } catch (error) {
      logger.error('Failed to republish job', {
        jobId: job.id,
        reason,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
