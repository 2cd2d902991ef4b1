import { z } from 'zod';
import type { Session, SessionFields } from '../domain/entities/Session.js';
import { filterScopes } from '../domain/entities/Session.js';
import { resolveScopeId } from '../domain/scopes.js';
import type { ScopeId } from '../domain/scopes.js';
import { NotFoundError, UnauthorizedError, ValidationError } from '../domain/errors.js';
import type { SessionRepository } from '../infra/repositories/SessionRepository.js';
import { logger } from '../infra/logger.js';

const ownerIdSchema = z.string().trim().min(1, { message: 'ownerId is required' });

/**
 * SessionService - per-user session store operations
 * Written by the authorization flow and by credential refresh; read by the worker pool.
 */
export class SessionService {
  constructor(private sessionRepo: SessionRepository) {}

  getSession(ownerId: string): Session {
    const session = this.sessionRepo.getByOwner(ownerId);
    if (!session) {
      throw new NotFoundError('Session', ownerId);
    }
    return session;
  }

  findSession(ownerId: string): Session | null {
    return this.sessionRepo.getByOwner(ownerId);
  }

  /**
   * Creates or merges the session; scope lists accept catalog ids or provider URLs
   */
  upsertSession(ownerId: string, fields: SessionFields): Session {
    const parsedOwner = ownerIdSchema.safeParse(ownerId);
    if (!parsedOwner.success) {
      throw new ValidationError('Invalid owner id', { issues: parsedOwner.error.issues });
    }

    const normalized: SessionFields = { ...fields };
    if (fields.requestedScopes !== undefined) {
      const { ids, unknown } = this.normalizeScopes(fields.requestedScopes);
      if (unknown.length > 0) {
        throw new ValidationError(`Invalid scopes: ${unknown.join(', ')}`, { unknown });
      }
      normalized.requestedScopes = ids;
    }
    if (fields.grantedScopes !== undefined) {
      // Providers may grant scopes outside the catalog (e.g. userinfo); they carry no capability here
      const { ids, unknown } = this.normalizeScopes(fields.grantedScopes);
      if (unknown.length > 0) {
        logger.debug('Dropping granted scopes outside the catalog', { ownerId, unknown });
      }
      normalized.grantedScopes = ids;
    }

    const session = this.sessionRepo.upsert(parsedOwner.data, normalized);
    logger.info('Session saved', {
      ownerId: session.ownerId,
      authenticated: session.authenticated,
      grantedScopes: session.grantedScopes.length,
    });
    return session;
  }

  /**
   * Requested capabilities narrowed to what the user actually granted
   */
  scopeFilter(ownerId: string, requested: Iterable<string>): string[] {
    return filterScopes(this.getSession(ownerId), requested);
  }

  requireAuthenticated(ownerId: string): Session {
    const session = this.sessionRepo.getByOwner(ownerId);
    if (!session || !session.authenticated || !session.credentialData) {
      throw new UnauthorizedError('User not authenticated. Please complete the OAuth flow first.');
    }
    return session;
  }

  deauthenticate(ownerId: string): Session {
    this.getSession(ownerId);
    const session = this.sessionRepo.upsert(ownerId, { authenticated: false });
    logger.info('Session deauthenticated', { ownerId });
    return session;
  }

  private normalizeScopes(values: string[]): { ids: ScopeId[]; unknown: string[] } {
    const unknown: string[] = [];
    const ids: ScopeId[] = [];
    for (const value of values) {
      const id = resolveScopeId(value);
      if (id) {
        ids.push(id);
      } else {
        unknown.push(value);
      }
    }
    return { ids, unknown };
  }
}
