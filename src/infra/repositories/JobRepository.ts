import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type {
  Job,
  JobError,
  JobStatus,
  UsageMetrics,
} from '../../domain/entities/Job.js';
import { TERMINAL_STATUSES, statusesLeadingTo } from '../../domain/entities/Job.js';
import { logger } from '../logger.js';

type JobRow = {
  id: string;
  owner_id: string;
  input: string;
  status: JobStatus;
  result: string | null;
  error: string | null;
  usage_metrics: string | null;
  env_context: string;
  attempts: number;
  claimed_by: string | null;
  heartbeat_at: string | null;
  published_at: string | null;
  requeued_at: string | null;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
};

const CLAIMABLE = statusesLeadingTo('running');
const COMPLETABLE = statusesLeadingTo('completed');
const FAILABLE = statusesLeadingTo('failed');

/**
 * Job store
 * Every state change is a single conditional UPDATE guarded by the statuses the
 * transition table allows; callers learn from the returned boolean whether they
 * still own the job.
 */
export class JobRepository {
  constructor(private db: DatabaseAdapter) {}

  create(job: Job): void {
    const sql = `
      INSERT INTO jobs (
        id, owner_id, input, status, result, error, usage_metrics, env_context, attempts,
        claimed_by, heartbeat_at, published_at, created_at, updated_at, started_at, completed_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      job.id,
      job.ownerId,
      job.input,
      job.status,
      job.result,
      job.error ? JSON.stringify(job.error) : null,
      job.usageMetrics ? JSON.stringify(job.usageMetrics) : null,
      JSON.stringify(job.envContext),
      job.attempts,
      job.claimedBy,
      toIso(job.heartbeatAt),
      toIso(job.publishedAt),
      job.createdAt.toISOString(),
      job.updatedAt.toISOString(),
      toIso(job.startedAt),
      toIso(job.completedAt),
    ]);

    logger.debug('Job created', { jobId: job.id, status: job.status });
  }

  getById(jobId: string): Job | null {
    const row = this.db.queryOne<JobRow>('SELECT * FROM jobs WHERE id = ?', [jobId]);
    return row ? this.mapRowToJob(row) : null;
  }

  getByIdForOwner(jobId: string, ownerId: string): Job | null {
    const row = this.db.queryOne<JobRow>('SELECT * FROM jobs WHERE id = ? AND owner_id = ?', [
      jobId,
      ownerId,
    ]);
    return row ? this.mapRowToJob(row) : null;
  }

  listByOwner(ownerId: string): Job[] {
    const sql = `
      SELECT * FROM jobs
      WHERE owner_id = ?
      ORDER BY created_at DESC, rowid DESC
    `;

    const rows = this.db.query<JobRow>(sql, [ownerId]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  markPublished(jobId: string, publishedAt: Date): void {
    this.db.execute('UPDATE jobs SET published_at = ? WHERE id = ?', [
      publishedAt.toISOString(),
      jobId,
    ]);
  }

  /**
   * pending -> running compare-and-set
   * A running job whose heartbeat predates staleBefore may be reclaimed.
   */
  claim(params: { jobId: string; workerId: string; now: Date; staleBefore: Date }): boolean {
    const now = params.now.toISOString();
    const sql = `
      UPDATE jobs
      SET status = 'running', claimed_by = ?, started_at = ?, heartbeat_at = ?, updated_at = ?
      WHERE id = ?
        AND (
          status IN (${placeholders(CLAIMABLE)})
          OR (status = 'running' AND (heartbeat_at IS NULL OR heartbeat_at < ?))
        )
    `;

    const changes = this.db.execute(sql, [
      params.workerId,
      now,
      now,
      now,
      params.jobId,
      ...CLAIMABLE,
      params.staleBefore.toISOString(),
    ]);

    return changes === 1;
  }

  /**
   * Records the start of an attempt and refreshes the heartbeat
   * Returns false when the caller no longer holds the claim.
   */
  recordAttempt(params: { jobId: string; workerId: string; attempts: number; now: Date }): boolean {
    const now = params.now.toISOString();
    const sql = `
      UPDATE jobs
      SET attempts = ?, heartbeat_at = ?, updated_at = ?
      WHERE id = ? AND status = 'running' AND claimed_by = ?
    `;

    return (
      this.db.execute(sql, [params.attempts, now, now, params.jobId, params.workerId]) === 1
    );
  }

  complete(params: {
    jobId: string;
    workerId: string;
    result: string;
    usageMetrics: UsageMetrics | null;
    now: Date;
  }): boolean {
    const now = params.now.toISOString();
    const sql = `
      UPDATE jobs
      SET status = 'completed', result = ?, usage_metrics = ?, error = NULL,
          completed_at = ?, updated_at = ?
      WHERE id = ? AND status IN (${placeholders(COMPLETABLE)}) AND claimed_by = ?
    `;

    const changes = this.db.execute(sql, [
      params.result,
      params.usageMetrics ? JSON.stringify(params.usageMetrics) : null,
      now,
      now,
      params.jobId,
      ...COMPLETABLE,
      params.workerId,
    ]);

    logger.debug('Job completion write', { jobId: params.jobId, applied: changes === 1 });
    return changes === 1;
  }

  fail(params: { jobId: string; workerId: string; error: JobError; now: Date }): boolean {
    const now = params.now.toISOString();
    const sql = `
      UPDATE jobs
      SET status = 'failed', error = ?, result = NULL, completed_at = ?, updated_at = ?
      WHERE id = ? AND status IN (${placeholders(FAILABLE)}) AND claimed_by = ?
    `;

    const changes = this.db.execute(sql, [
      JSON.stringify(params.error),
      now,
      now,
      params.jobId,
      ...FAILABLE,
      params.workerId,
    ]);

    logger.debug('Job failure write', { jobId: params.jobId, applied: changes === 1 });
    return changes === 1;
  }

  /**
   * Gives up the claim without finishing the job
   * Clearing the heartbeat makes the job claimable by the next delivery at once.
   */
  releaseClaim(params: { jobId: string; workerId: string; now: Date }): boolean {
    const sql = `
      UPDATE jobs
      SET heartbeat_at = NULL, updated_at = ?
      WHERE id = ? AND status = 'running' AND claimed_by = ?
    `;

    return (
      this.db.execute(sql, [params.now.toISOString(), params.jobId, params.workerId]) === 1
    );
  }

  /**
   * Pending jobs whose task message never reached the queue
   */
  listUnpublishedPending(createdBefore: Date): Job[] {
    const sql = `
      SELECT * FROM jobs
      WHERE status = 'pending' AND published_at IS NULL AND created_at < ?
      ORDER BY created_at ASC
    `;

    const rows = this.db.query<JobRow>(sql, [createdBefore.toISOString()]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  /**
   * Running jobs with no heartbeat since the cutoff that were not already
   * requeued since then
   */
  listStaleRunning(cutoff: Date): Job[] {
    const sql = `
      SELECT * FROM jobs
      WHERE status = 'running'
        AND (heartbeat_at IS NULL OR heartbeat_at < ?)
        AND (requeued_at IS NULL OR requeued_at < ?)
      ORDER BY created_at ASC
    `;

    const iso = cutoff.toISOString();
    const rows = this.db.query<JobRow>(sql, [iso, iso]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  markRequeued(jobId: string, requeuedAt: Date): void {
    this.db.execute(`UPDATE jobs SET requeued_at = ? WHERE id = ? AND status = 'running'`, [
      requeuedAt.toISOString(),
      jobId,
    ]);
  }

  listTerminalIdsOlderThan(cutoff: Date): string[] {
    const sql = `
      SELECT id FROM jobs
      WHERE status IN (${placeholders(TERMINAL_STATUSES)}) AND created_at < ?
    `;
    const rows = this.db.query<{ id: string }>(sql, [...TERMINAL_STATUSES, cutoff.toISOString()]);
    return rows.map((row) => row.id);
  }

  deleteByIds(jobIds: string[]): number {
    if (jobIds.length === 0) return 0;
    return this.db.execute(`DELETE FROM jobs WHERE id IN (${placeholders(jobIds)})`, jobIds);
  }

  private mapRowToJob(row: JobRow): Job {
    return {
      id: row.id,
      ownerId: row.owner_id,
      input: row.input,
      status: row.status,
      result: row.result,
      error: row.error ? parseJson<JobError>(row.error) : null,
      usageMetrics: row.usage_metrics ? parseJson<UsageMetrics>(row.usage_metrics) : null,
      envContext: Object.freeze(parseJson<Record<string, string>>(row.env_context)),
      attempts: row.attempts,
      claimedBy: row.claimed_by,
      heartbeatAt: fromIso(row.heartbeat_at),
      publishedAt: fromIso(row.published_at),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      startedAt: fromIso(row.started_at),
      completedAt: fromIso(row.completed_at),
    };
  }
}

function placeholders(values: readonly unknown[]): string {
  return values.map(() => '?').join(', ');
}

function toIso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

function fromIso(value: string | null): Date | null {
  return value ? new Date(value) : null;
}

function parseJson<T>(value: string): T {
  return JSON.parse(value) as T;
}
