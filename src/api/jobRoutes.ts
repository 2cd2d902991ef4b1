import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { JobService } from '../services/JobService.js';
import type { SessionService } from '../services/SessionService.js';
import { ValidationError } from '../domain/errors.js';
import { requireOwnerId } from './authMiddleware.js';
import { mapJobSummaryToResponse, mapJobToResponse } from './jobMapper.js';

export const SESSION_USER_ID_KEY = 'SESSION_USER_ID';
export const AUTHORIZED_SCOPES_KEY = 'AUTHORIZED_SCOPES';

const submitBodySchema = z.object({
  message: z.string({ required_error: 'message is required' }),
  env: z.record(z.string()).optional(),
});

/**
 * Jobs route handler
 * Every read is scoped to the authenticated owner.
 */
export function createJobRouter(jobService: JobService, sessionService: SessionService): Router {
  const router = Router();

  /**
   * POST /api/jobs
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireOwnerId(req);
      const body = submitBodySchema.safeParse(req.body ?? {});
      if (!body.success) {
        throw new ValidationError(body.error.issues[0]?.message ?? 'Invalid request body', {
          issues: body.error.issues,
        });
      }

      const session = sessionService.requireAuthenticated(ownerId);
      const authorizedScopes = sessionService.scopeFilter(ownerId, session.requestedScopes);

      const job = await jobService.submit({
        ownerId,
        input: body.data.message,
        envContext: {
          ...body.data.env,
          [SESSION_USER_ID_KEY]: ownerId,
          [AUTHORIZED_SCOPES_KEY]: JSON.stringify(authorizedScopes),
        },
      });

      res.status(202).json({
        jobId: job.id,
        status: job.status,
        message: 'Job queued for processing',
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const jobs = jobService.listJobs(requireOwnerId(req));
      res.json({ jobs: jobs.map(mapJobSummaryToResponse), total: jobs.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId
   */
  router.get('/:jobId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = jobService.getJob(req.params.jobId, requireOwnerId(req));
      res.json({ job: mapJobToResponse(job) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
