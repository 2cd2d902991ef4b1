import type { Job, JobSummary } from '../domain/entities/Job.js';

export function mapJobSummaryToResponse(job: JobSummary) {
  return {
    id: job.id,
    status: job.status,
    message: job.input,
    result: job.result,
    error: job.error,
    usageMetrics: job.usageMetrics,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
    completedAt: job.completedAt,
  };
}

/**
 * Detail view; the env context stays server-side since it carries the caller's secrets
 */
export function mapJobToResponse(job: Job) {
  return {
    ...mapJobSummaryToResponse(job),
    attempts: job.attempts,
    startedAt: job.startedAt,
  };
}
