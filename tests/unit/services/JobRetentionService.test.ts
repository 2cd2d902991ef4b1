import { describe, expect, it, vi } from 'vitest';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { JobRepository } from '../../../src/infra/repositories/JobRepository.js';
import { JobRetentionService } from '../../../src/services/JobRetentionService.js';
import { createJob } from '../../../src/domain/entities/Job.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

const DAY = 24 * 60 * 60 * 1000;

describe('JobRetentionService', () => {
  it('deletes only finished jobs older than the retention window', () => {
    const now = Date.parse('2026-03-20T03:00:00.000Z');
    const jobRepo = new JobRepository(new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' }));
    const service = new JobRetentionService(jobRepo, () => new Date(now));

    const add = (id: string, createdAtMs: number) =>
      jobRepo.create(createJob({ id, ownerId: 'user-1', input: id, now: new Date(createdAtMs) }));
    const finish = (id: string, at: number) => {
      jobRepo.claim({ jobId: id, workerId: 'w', now: new Date(at), staleBefore: new Date(at) });
      jobRepo.complete({ jobId: id, workerId: 'w', result: 'ok', usageMetrics: null, now: new Date(at) });
    };

    add('old-completed', now - 10 * DAY);
    finish('old-completed', now - 10 * DAY);
    add('old-failed', now - 8 * DAY);
    jobRepo.claim({ jobId: 'old-failed', workerId: 'w', now: new Date(now - 8 * DAY), staleBefore: new Date(0) });
    jobRepo.fail({
      jobId: 'old-failed',
      workerId: 'w',
      error: { kind: 'non_retriable', code: 'TOOLKIT_REJECTED', message: 'no', attempts: 1 },
      now: new Date(now - 8 * DAY),
    });
    add('old-pending', now - 9 * DAY);
    add('recent-completed', now - 2 * DAY);
    finish('recent-completed', now - 2 * DAY);

    expect(service.cleanupOlderThan(7)).toBe(2);

    expect(jobRepo.getById('old-completed')).toBeNull();
    expect(jobRepo.getById('old-failed')).toBeNull();
    expect(jobRepo.getById('old-pending')?.status).toBe('pending');
    expect(jobRepo.getById('recent-completed')?.status).toBe('completed');
  });

  it('returns zero when nothing expired', () => {
    const jobRepo = new JobRepository(new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' }));

    expect(new JobRetentionService(jobRepo).cleanupOlderThan(7)).toBe(0);
  });
});
