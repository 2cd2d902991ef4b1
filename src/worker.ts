import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createContainer } from './infra/container.js';
import { ConfigError } from './domain/errors.js';

/**
 * Standalone worker process: pull loops plus the maintenance scheduler, no HTTP
 */
dotenv.config();

const env = validateEnv();
if (env.QUEUE_DRIVER === 'memory') {
  throw new ConfigError('QUEUE_DRIVER=memory only works with embedded workers in the API process');
}

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const container = createContainer(env);
container.workerPool.start();
container.scheduler.start();

loggerInstance.info('Worker process started', {
  concurrency: env.WORKER_CONCURRENCY,
  queues: env.WORKER_QUEUES,
});

async function shutdown(signal: string): Promise<void> {
  loggerInstance.info(`${signal} received, draining workers`);
  container.scheduler.stop();
  await container.workerPool.stop();
  container.db.close();
  loggerInstance.info('Worker process stopped');
  process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      loggerInstance.error('Shutdown failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  });
}
