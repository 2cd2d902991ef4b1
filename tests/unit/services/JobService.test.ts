import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { JobRepository } from '../../../src/infra/repositories/JobRepository.js';
import { InMemoryTaskQueue } from '../../../src/infra/queue/InMemoryTaskQueue.js';
import { JobService, MAX_INPUT_LENGTH } from '../../../src/services/JobService.js';
import { NotFoundError, PublishError, ValidationError } from '../../../src/domain/errors.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('JobService', () => {
  let jobRepo: JobRepository;
  let queue: InMemoryTaskQueue;
  let service: JobService;
  let nowMs: number;

  beforeEach(() => {
    nowMs = Date.parse('2026-03-01T10:00:00.000Z');
    jobRepo = new JobRepository(new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' }));
    queue = new InMemoryTaskQueue({ visibilityTimeoutMs: 60_000 });
    service = new JobService(jobRepo, queue, {
      queueName: 'agent_runs',
      clock: () => new Date(nowMs),
    });
  });

  it('persists a pending job and publishes its task', async () => {
    const job = await service.submit({
      ownerId: 'user-1',
      input: 'Draft a reply',
      envContext: { SESSION_USER_ID: 'user-1' },
    });

    expect(job.status).toBe('pending');
    expect(job.publishedAt).toEqual(new Date(nowMs));
    expect(jobRepo.getById(job.id)?.publishedAt).toEqual(new Date(nowMs));

    const delivery = await queue.reserve(['agent_runs']);
    expect(delivery?.message).toEqual({
      jobId: job.id,
      ownerId: 'user-1',
      input: 'Draft a reply',
      envContext: { SESSION_USER_ID: 'user-1' },
    });
  });

  it('rejects invalid submissions before creating anything', async () => {
    await expect(service.submit({ ownerId: 'user-1', input: '   ' })).rejects.toThrow(
      'message must not be empty'
    );
    await expect(
      service.submit({ ownerId: 'user-1', input: 'x'.repeat(MAX_INPUT_LENGTH + 1) })
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(service.submit({ ownerId: ' ', input: 'hello' })).rejects.toThrow(
      'ownerId is required'
    );

    expect(service.listJobs('user-1')).toEqual([]);
    expect(await queue.depth('agent_runs')).toBe(0);
  });

  it('keeps the job pending and unpublished when the queue is down', async () => {
    vi.spyOn(queue, 'publish').mockRejectedValue(new Error('connection refused'));

    const error = await service
      .submit({ ownerId: 'user-1', input: 'hello' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PublishError);
    expect(error).toMatchObject({ statusCode: 503, retriable: true });

    const [stored] = jobRepo.listByOwner('user-1');
    expect(stored?.status).toBe('pending');
    expect(stored?.publishedAt).toBeNull();
    expect(error).toMatchObject({ details: { jobId: stored?.id } });
  });

  it('scopes reads to the owner with one error for absent and foreign jobs', async () => {
    const job = await service.submit({ ownerId: 'user-1', input: 'hello' });

    expect(service.getJob(job.id, 'user-1').id).toBe(job.id);
    expect(() => service.getJob(job.id, 'user-2')).toThrow(NotFoundError);
    expect(() => service.getJob(job.id, 'user-2')).toThrow(`Job with id ${job.id} not found`);
    expect(() => service.getJob('missing', 'user-1')).toThrow('Job with id missing not found');
  });

  it('lists summaries newest first without env context', async () => {
    const first = await service.submit({
      ownerId: 'user-1',
      input: 'first',
      envContext: { API_TOKEN: 'test-secret' },
    });
    nowMs += 1000;
    const second = await service.submit({ ownerId: 'user-1', input: 'second' });
    await service.submit({ ownerId: 'user-2', input: 'other' });

    const jobs = service.listJobs('user-1');

    expect(jobs.map((job) => job.id)).toEqual([second.id, first.id]);
    expect(jobs[1]).not.toHaveProperty('envContext');
  });
});
