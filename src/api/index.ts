import { Router } from 'express';
import { createJobRouter } from './jobRoutes.js';
import { createScopeRouter, createSessionRouter } from './sessionRoutes.js';
import { createAuthMiddleware } from './authMiddleware.js';
import type { JobService } from '../services/JobService.js';
import type { SessionService } from '../services/SessionService.js';

/**
 * Main API router - composes all route handlers
 * Dependencies are injected from the container.
 */
export function createApiRouter(deps: {
  jobService: JobService;
  sessionService: SessionService;
  jwtSecret: string;
}): Router {
  const router = Router();
  const authenticate = createAuthMiddleware(deps.jwtSecret);

  // Public
  router.use('/auth', createScopeRouter());

  router.use('/auth', authenticate, createSessionRouter(deps.sessionService));
  router.use('/jobs', authenticate, createJobRouter(deps.jobService, deps.sessionService));

  return router;
}
