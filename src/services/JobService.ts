import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Job, JobSummary } from '../domain/entities/Job.js';
import { createJob, toJobSummary } from '../domain/entities/Job.js';
import { NotFoundError, PublishError, ValidationError } from '../domain/errors.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { TaskQueue } from '../infra/queue/TaskQueue.js';
import { logger } from '../infra/logger.js';

export const MAX_INPUT_LENGTH = 100_000;

const submissionSchema = z.object({
  ownerId: z.string().trim().min(1, { message: 'ownerId is required' }),
  input: z
    .string({ required_error: 'message is required' })
    .refine((value) => value.trim().length > 0, { message: 'message must not be empty' })
    .refine((value) => value.length <= MAX_INPUT_LENGTH, {
      message: `message exceeds ${MAX_INPUT_LENGTH} characters`,
    }),
  envContext: z.record(z.string()).default({}),
});

export type SubmitJobParams = z.input<typeof submissionSchema>;

/**
 * JobService - submission gateway
 * Writes the job record, publishes the task, and serves owner-scoped reads.
 */
export class JobService {
  constructor(
    private jobRepo: JobRepository,
    private queue: TaskQueue,
    private options: { queueName: string; clock?: () => Date }
  ) {}

  /**
   * Persists a pending job and publishes its task message
   * If publishing fails the job stays pending and unpublished, for the
   * reconciliation pass to pick up, and the caller gets a PublishError.
   */
  async submit(params: SubmitJobParams): Promise<Job> {
    const parsed = submissionSchema.safeParse(params);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid submission', {
        issues: parsed.error.issues,
      });
    }

    const { ownerId, input, envContext } = parsed.data;
    const job = createJob({
      id: randomUUID(),
      ownerId,
      input,
      envContext,
      now: this.now(),
    });

    this.jobRepo.create(job);
    logger.info('Job created', { jobId: job.id, ownerId });

    try {
      await this.queue.publish(this.options.queueName, {
        jobId: job.id,
        ownerId: job.ownerId,
        input: job.input,
        envContext: { ...job.envContext },
      });
    } catch (error) {
      logger.error('Failed to publish job task', {
        jobId: job.id,
        queue: this.options.queueName,
        message: error instanceof Error ? error.message : String(error),
      });
      throw new PublishError('Job queue unavailable, retry the submission later', job.id);
    }

    const publishedAt = this.now();
    this.jobRepo.markPublished(job.id, publishedAt);
    logger.info('Job queued', { jobId: job.id, queue: this.options.queueName });
    return { ...job, publishedAt };
  }

  /**
   * Absent and not-owned jobs produce the same NotFoundError
   */
  getJob(jobId: string, requestingOwnerId: string): Job {
    const job = this.jobRepo.getByIdForOwner(jobId, requestingOwnerId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  listJobs(ownerId: string): JobSummary[] {
    return this.jobRepo.listByOwner(ownerId).map(toJobSummary);
  }

  private now(): Date {
    return this.options.clock ? this.options.clock() : new Date();
  }
}
