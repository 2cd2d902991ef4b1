import type { Request, Response, NextFunction } from 'express';
import { isAppError } from '../domain/errors.js';
import { logger, redactSecrets } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

/**
 * Global error handler middleware
 * Maps domain errors to HTTP status codes; secrets are redacted before logging and responding.
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const context = {
      method: req.method,
      path: req.path,
      ip: req.ip,
      ownerId: req.ownerId,
      userAgent: req.get('user-agent'),
    };

    if (isAppError(err)) {
      const meta = {
        code: err.code,
        message: err.message,
        details: redactSecrets(err.details),
        stack: env.NODE_ENV === 'development' ? err.stack : undefined,
        ...context,
      };
      if (err.statusCode >= 500) {
        logger.error('Application error', meta);
      } else {
        logger.warn('Application error', meta);
      }

      res.status(err.statusCode).json({
        error: err.code,
        message: err.message,
        ...(err.details ? { details: redactSecrets(err.details) } : {}),
      });
    } else if (err.name === 'SyntaxError' && 'body' in err) {
      logger.warn('Invalid JSON in request', {
        message: err.message,
        ...context,
      });

      res.status(400).json({
        error: 'INVALID_JSON',
        message: 'Invalid JSON in request body',
      });
    } else {
      // Unknown error - log full details but return generic message
      logger.error('Unexpected error', {
        message: err.message,
        name: err.name,
        stack: err.stack,
        ...context,
      });

      res.status(500).json({
        error: 'INTERNAL_SERVER_ERROR',
        message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
      });
    }
  };
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
