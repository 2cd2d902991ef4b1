import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { SessionService } from '../services/SessionService.js';
import { listScopes } from '../domain/scopes.js';
import { requireOwnerId } from './authMiddleware.js';

/**
 * GET /api/auth/scopes - the scope catalog, no authentication required
 */
export function createScopeRouter(): Router {
  const router = Router();

  router.get('/scopes', (_req: Request, res: Response) => {
    res.json({ scopes: listScopes() });
  });

  return router;
}

export function createSessionRouter(sessionService: SessionService): Router {
  const router = Router();

  /**
   * GET /api/auth/status
   */
  router.get('/status', (req: Request, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireOwnerId(req);
      const session = sessionService.findSession(ownerId);
      if (!session) {
        res.json({ authenticated: false, requestedScopes: [], grantedScopes: [], email: null });
        return;
      }
      res.json({
        authenticated: session.authenticated && session.credentialData !== null,
        requestedScopes: session.requestedScopes,
        grantedScopes: session.grantedScopes,
        email: session.profile?.email ?? null,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/auth/logout
   */
  router.delete('/logout', (req: Request, res: Response, next: NextFunction) => {
    try {
      sessionService.deauthenticate(requireOwnerId(req));
      res.json({ message: 'Logged out' });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
