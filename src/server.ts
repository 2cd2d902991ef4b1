import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createContainer } from './infra/container.js';
import { createApp } from './app.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const container = createContainer(env);
const app = createApp(container);

const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    queueDriver: env.QUEUE_DRIVER,
    embeddedWorkers: env.EMBEDDED_WORKERS,
  });

  if (env.EMBEDDED_WORKERS) {
    container.workerPool.start();
    container.scheduler.start();
  }
});

async function shutdown(signal: string): Promise<void> {
  loggerInstance.info(`${signal} received, shutting down gracefully`);
  container.scheduler.stop();
  await container.workerPool.stop();
  server.close(() => {
    container.db.close();
    loggerInstance.info('Server closed');
    process.exit(0);
  });
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

export { app };
