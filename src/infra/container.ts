import type { Env } from './env.js';
import { DatabaseAdapter } from './DatabaseAdapter.js';
import { JobRepository } from './repositories/JobRepository.js';
import { SessionRepository } from './repositories/SessionRepository.js';
import type { TaskQueue } from './queue/TaskQueue.js';
import { SqliteTaskQueue } from './queue/SqliteTaskQueue.js';
import { InMemoryTaskQueue } from './queue/InMemoryTaskQueue.js';
import type { Toolkit } from './toolkit/Toolkit.js';
import { createAgentToolkit } from './toolkit/AgentToolkit.js';
import type { TokenRefresher } from './oauth/TokenRefresher.js';
import { createGoogleTokenRefresher } from './oauth/GoogleTokenRefresher.js';
import { JobService } from '../services/JobService.js';
import { SessionService } from '../services/SessionService.js';
import { CredentialService } from '../services/CredentialService.js';
import { RetryPolicy } from '../services/RetryPolicy.js';
import { JobWorker } from '../services/JobWorker.js';
import { WorkerPool, defaultWorkerId } from '../services/WorkerPool.js';
import { JobReconciliationService } from '../services/JobReconciliationService.js';
import { JobRetentionService } from '../services/JobRetentionService.js';
import { MaintenanceScheduler } from '../scheduler/MaintenanceScheduler.js';

export interface Container {
  env: Env;
  db: DatabaseAdapter;
  queue: TaskQueue;
  jobRepo: JobRepository;
  sessionRepo: SessionRepository;
  jobService: JobService;
  sessionService: SessionService;
  credentialService: CredentialService;
  workerPool: WorkerPool;
  reconciliation: JobReconciliationService;
  retention: JobRetentionService;
  scheduler: MaintenanceScheduler;
}

/** Adapters a caller may swap out, e.g. for in-process stand-ins */
export interface ContainerOverrides {
  db?: DatabaseAdapter;
  queue?: TaskQueue;
  toolkit?: Toolkit;
  refresher?: TokenRefresher;
}

const MINUTE_MS = 60 * 1000;

/**
 * Wires adapters, repositories and services from validated env
 */
export function createContainer(env: Env, overrides: ContainerOverrides = {}): Container {
  const db = overrides.db ?? new DatabaseAdapter(env);
  const visibilityTimeoutMs = env.QUEUE_VISIBILITY_TIMEOUT_SECONDS * 1000;
  const queue =
    overrides.queue ??
    (env.QUEUE_DRIVER === 'memory'
      ? new InMemoryTaskQueue({ visibilityTimeoutMs })
      : new SqliteTaskQueue(db, { visibilityTimeoutMs }));

  const jobRepo = new JobRepository(db);
  const sessionRepo = new SessionRepository(db);

  const toolkit = overrides.toolkit ?? createAgentToolkit(env);
  const refresher = overrides.refresher ?? createGoogleTokenRefresher(env);

  const jobService = new JobService(jobRepo, queue, { queueName: env.JOB_QUEUE_NAME });
  const sessionService = new SessionService(sessionRepo);
  const credentialService = new CredentialService(sessionRepo, refresher, {
    refreshSkewMs: env.CREDENTIAL_REFRESH_SKEW_SECONDS * 1000,
  });

  const retryPolicy = new RetryPolicy({
    maxAttempts: env.JOB_MAX_ATTEMPTS,
    baseDelayMs: env.JOB_RETRY_BASE_DELAY_MS,
    maxDelayMs: env.JOB_RETRY_MAX_DELAY_MS,
    jitterRatio: env.JOB_RETRY_JITTER_RATIO,
  });

  const staleAfterMs = env.JOB_STALE_AFTER_MINUTES * MINUTE_MS;
  const workers = Array.from(
    { length: env.WORKER_CONCURRENCY },
    (_, index) =>
      new JobWorker(
        { jobRepo, queue, toolkit, credentials: credentialService, retryPolicy },
        { workerId: defaultWorkerId(index), staleAfterMs }
      )
  );
  const workerPool = new WorkerPool(queue, workers, {
    queues: env.WORKER_QUEUES,
    pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
  });

  const reconciliation = new JobReconciliationService(jobRepo, queue, {
    queueName: env.JOB_QUEUE_NAME,
    orphanAfterMs: env.JOB_ORPHAN_AFTER_MINUTES * MINUTE_MS,
    staleAfterMs,
  });
  const retention = new JobRetentionService(jobRepo);
  const scheduler = new MaintenanceScheduler(env, reconciliation, retention);

  return {
    env,
    db,
    queue,
    jobRepo,
    sessionRepo,
    jobService,
    sessionService,
    credentialService,
    workerPool,
    reconciliation,
    retention,
    scheduler,
  };
}
