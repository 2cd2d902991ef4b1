import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import type { Container } from './infra/container.js';
import { logger } from './infra/logger.js';

/**
 * Builds the HTTP application; listening and shutdown belong to the entry point
 */
export function createApp(container: Container): Express {
  const { env, db, queue } = container;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/ready', async (_req: Request, res: Response) => {
    try {
      db.queryOne('SELECT 1 as ok');
      const depth = await queue.depth(env.JOB_QUEUE_NAME);
      res.json({ status: 'ready', queueDepth: depth });
    } catch (error) {
      logger.warn('Readiness check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({ status: 'not-ready' });
    }
  });

  app.use(
    '/api',
    createApiRouter({
      jobService: container.jobService,
      sessionService: container.sessionService,
      jwtSecret: env.JWT_SECRET,
    })
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(env));

  return app;
}
