import { setTimeout as delay } from 'node:timers/promises';
import type { Job, JobError } from '../domain/entities/Job.js';
import { FatalExecutionError, StorageError, isToolkitError } from '../domain/errors.js';
import type { ToolkitError } from '../domain/errors.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { TaskDelivery, TaskQueue } from '../infra/queue/TaskQueue.js';
import type { Toolkit } from '../infra/toolkit/Toolkit.js';
import { logger } from '../infra/logger.js';
import type { CredentialService } from './CredentialService.js';
import type { RetryPolicy } from './RetryPolicy.js';

export type DeliveryOutcome = 'completed' | 'failed' | 'discarded' | 'abandoned';

export interface JobWorkerOptions {
  workerId: string;
  staleAfterMs: number;
  /** Delay before a message abandoned on a storage failure becomes visible again */
  abandonDelayMs?: number;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

type AttemptResult = { kind: 'completed' } | { kind: 'failed' } | { kind: 'lost' };

/**
 * JobWorker - executes one delivered task message
 *
 * The claim is the only way in: a worker that loses it acks the duplicate and
 * leaves the job alone. Every later write is fenced on this worker's id, so a
 * worker whose claim was reclaimed as stale cannot overwrite the new owner.
 */
export class JobWorker {
  readonly workerId: string;
  private staleAfterMs: number;
  private abandonDelayMs: number;
  private clock: () => Date;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private deps: {
      jobRepo: JobRepository;
      queue: TaskQueue;
      toolkit: Toolkit;
      credentials: CredentialService;
      retryPolicy: RetryPolicy;
    },
    options: JobWorkerOptions
  ) {
    this.workerId = options.workerId;
    this.staleAfterMs = options.staleAfterMs;
    this.abandonDelayMs = options.abandonDelayMs ?? 5000;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  async processDelivery(delivery: TaskDelivery): Promise<DeliveryOutcome> {
    const { jobId } = delivery.message;
    const log = { jobId, workerId: this.workerId, deliveryCount: delivery.deliveryCount };
    let claimed = false;

    try {
      const now = this.clock();
      claimed = this.deps.jobRepo.claim({
        jobId,
        workerId: this.workerId,
        now,
        staleBefore: new Date(now.getTime() - this.staleAfterMs),
      });

      if (!claimed) {
        logger.info('Job already claimed or finished, discarding delivery', log);
        await this.deps.queue.ack(delivery);
        return 'discarded';
      }

      const job = this.deps.jobRepo.getById(jobId);
      if (!job) {
        throw new StorageError('Claimed job disappeared from the job store', { jobId });
      }

      logger.info('Job claimed', log);
      const outcome = await this.execute(job);
      await this.deps.queue.ack(delivery);

      if (outcome.kind === 'lost') {
        logger.warn('Lost job claim during execution, result discarded', log);
        return 'discarded';
      }
      return outcome.kind;
    } catch (error) {
      if (error instanceof StorageError) {
        return this.abandon(delivery, claimed, error, log);
      }
      throw error;
    }
  }

  /**
   * Hands the job back after a storage failure
   * A held claim is released first so the redelivery can claim the job. If that
   * write fails too, the message stays reserved: its visibility timeout outlasts
   * the stale window, so the redelivery finds the claim reclaimable.
   */
  private async abandon(
    delivery: TaskDelivery,
    claimed: boolean,
    error: StorageError,
    log: Record<string, unknown>
  ): Promise<DeliveryOutcome> {
    if (claimed) {
      try {
        this.deps.jobRepo.releaseClaim({
          jobId: delivery.message.jobId,
          workerId: this.workerId,
          now: this.clock(),
        });
      } catch (releaseError) {
        logger.error('Storage failure while processing job, leaving delivery reserved', {
          ...log,
          message: error.message,
          releaseError: releaseError instanceof Error ? releaseError.message : String(releaseError),
        });
        return 'abandoned';
      }
    }

    logger.error('Storage failure while processing job, releasing for redelivery', {
      ...log,
      message: error.message,
    });
    await this.deps.queue.release(delivery, this.abandonDelayMs);
    return 'abandoned';
  }

  /**
   * Attempts are budgeted from the stored count, so a reclaimed job keeps the
   * attempts its earlier workers already spent.
   */
  private async execute(job: Job): Promise<AttemptResult> {
    const { retryPolicy } = this.deps;
    const envContext = Object.freeze({ ...job.envContext });
    let attempts = job.attempts;
    let forceRefresh = false;

    if (attempts >= retryPolicy.maxAttempts) {
      return this.failJob(job, {
        kind: 'retries_exhausted',
        code: 'ATTEMPTS_EXHAUSTED',
        message: `Job already used ${attempts} of ${retryPolicy.maxAttempts} attempts`,
        attempts,
      });
    }

    while (attempts < retryPolicy.maxAttempts) {
      attempts += 1;
      const stillOwned = this.deps.jobRepo.recordAttempt({
        jobId: job.id,
        workerId: this.workerId,
        attempts,
        now: this.clock(),
      });
      if (!stillOwned) {
        return { kind: 'lost' };
      }

      const step = await this.runAttempt(job, envContext, attempts, forceRefresh);
      if (step.kind !== 'error') {
        return step;
      }

      const failure = step.failure;
      if (!failure.retriable || !retryPolicy.canRetry(attempts)) {
        return this.failJob(job, {
          kind: failure.retriable ? 'retries_exhausted' : 'non_retriable',
          code: failure.code,
          message: failure.message,
          attempts,
        });
      }

      const waitMs = retryPolicy.delayFor(attempts);
      logger.warn('Retriable job failure, backing off', {
        jobId: job.id,
        attempt: attempts,
        code: failure.code,
        waitMs,
      });
      forceRefresh = failure.code === 'CREDENTIAL_EXPIRED';
      await this.sleep(waitMs);
    }

    // canRetry is false on the last attempt, so the loop always returns
    throw new Error('Retry loop exited without a terminal outcome');
  }

  private failJob(job: Job, jobError: JobError): AttemptResult {
    const applied = this.deps.jobRepo.fail({
      jobId: job.id,
      workerId: this.workerId,
      error: jobError,
      now: this.clock(),
    });
    if (!applied) {
      return { kind: 'lost' };
    }
    logger.warn('Job failed', {
      jobId: job.id,
      kind: jobError.kind,
      code: jobError.code,
      attempts: jobError.attempts,
    });
    return { kind: 'failed' };
  }

  private async runAttempt(
    job: Job,
    envContext: Job['envContext'],
    attempts: number,
    forceRefresh: boolean
  ): Promise<AttemptResult | { kind: 'error'; failure: ToolkitError }> {
    try {
      const credentials = await this.deps.credentials.resolve(job.ownerId, { forceRefresh });
      const outcome = await this.deps.toolkit.execute(job.input, envContext, credentials);
      const applied = this.deps.jobRepo.complete({
        jobId: job.id,
        workerId: this.workerId,
        result: outcome.result,
        usageMetrics: outcome.usageMetrics,
        now: this.clock(),
      });
      if (!applied) {
        return { kind: 'lost' };
      }
      logger.info('Job completed', { jobId: job.id, attempts });
      return { kind: 'completed' };
    } catch (error) {
      return { kind: 'error', failure: this.classify(error) };
    }
  }

  /**
   * Storage failures propagate; anything that is not a ToolkitError is non-retriable
   */
  private classify(error: unknown): ToolkitError {
    if (error instanceof StorageError) {
      throw error;
    }
    if (isToolkitError(error)) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new FatalExecutionError(message, 'TOOLKIT_ERROR');
  }
}
