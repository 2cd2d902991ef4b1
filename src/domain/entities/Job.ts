/**
 * Job entity - one agent run submitted by a user
 * Lifecycle: pending -> running -> completed | failed
 */
export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

/** Caller-scoped configuration captured at submission time */
export type EnvContext = Readonly<Record<string, string>>;

/** Resource counters reported by the toolkit, e.g. token consumption */
export type UsageMetrics = Record<string, number>;

export type JobFailureKind = 'retries_exhausted' | 'non_retriable';

export interface JobError {
  kind: JobFailureKind;
  code: string;
  message: string;
  attempts: number;
}

export interface Job {
  id: string;
  ownerId: string;
  input: string;
  status: JobStatus;
  result: string | null;
  error: JobError | null;
  usageMetrics: UsageMetrics | null;
  envContext: EnvContext;
  attempts: number;
  claimedBy: string | null;
  heartbeatAt: Date | null;
  publishedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

export type JobSummary = Pick<
  Job,
  | 'id'
  | 'ownerId'
  | 'input'
  | 'status'
  | 'result'
  | 'error'
  | 'usageMetrics'
  | 'createdAt'
  | 'updatedAt'
  | 'completedAt'
>;

export const JOB_STATUSES: readonly JobStatus[] = ['pending', 'running', 'completed', 'failed'];

const jobTransitions: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return jobTransitions[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return jobTransitions[status].length === 0;
}

/**
 * Statuses a job may be in for a write that moves it to `to`
 * The job store guards its conditional UPDATEs with these.
 */
export function statusesLeadingTo(to: JobStatus): JobStatus[] {
  return JOB_STATUSES.filter((from) => canTransition(from, to));
}

export const TERMINAL_STATUSES: readonly JobStatus[] = JOB_STATUSES.filter(isTerminal);

/**
 * Factory function to create a new pending Job
 * The env context is copied and frozen so later edits by the caller do not leak in.
 */
export function createJob(params: {
  id: string;
  ownerId: string;
  input: string;
  envContext?: Record<string, string> | null;
  now?: Date;
}): Job {
  const now = params.now ?? new Date();
  return {
    id: params.id,
    ownerId: params.ownerId,
    input: params.input,
    status: 'pending',
    result: null,
    error: null,
    usageMetrics: null,
    envContext: Object.freeze({ ...(params.envContext ?? {}) }),
    attempts: 0,
    claimedBy: null,
    heartbeatAt: null,
    publishedAt: null,
    createdAt: now,
    updatedAt: now,
    startedAt: null,
    completedAt: null,
  };
}

export function toJobSummary(job: Job): JobSummary {
  return {
    id: job.id,
    ownerId: job.ownerId,
    input: job.input,
    status: job.status,
    result: job.result,
    error: job.error,
    usageMetrics: job.usageMetrics,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
    completedAt: job.completedAt,
  };
}
