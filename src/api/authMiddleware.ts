import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

declare global {
  namespace Express {
    interface Request {
      ownerId?: string;
    }
  }
}

const tokenPayloadSchema = z.object({
  id: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
});

/**
 * Bearer token authentication
 * The token's `id` claim identifies the owner of every job the request touches.
 */
export function createAuthMiddleware(secret: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.get('authorization');
    if (!header || !header.startsWith('Bearer ')) {
      next(new UnauthorizedError('Missing bearer token'));
      return;
    }

    const token = header.slice('Bearer '.length).trim();
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
    } catch (error) {
      logger.warn('JWT verification failed', {
        path: req.path,
        error: error instanceof Error ? error.message : String(error),
      });
      next(new UnauthorizedError('Invalid or expired token'));
      return;
    }

    const payload = tokenPayloadSchema.safeParse(decoded);
    if (!payload.success) {
      next(new UnauthorizedError('Token does not identify a user'));
      return;
    }

    req.ownerId = payload.data.id;
    next();
  };
}

export function requireOwnerId(req: Request): string {
  if (!req.ownerId) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.ownerId;
}
