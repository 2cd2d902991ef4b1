import type { CredentialData, Session } from '../domain/entities/Session.js';
import { isCredentialExpired } from '../domain/entities/Session.js';
import { FatalExecutionError } from '../domain/errors.js';
import type { SessionRepository } from '../infra/repositories/SessionRepository.js';
import type { TokenRefresher } from '../infra/oauth/TokenRefresher.js';
import { logger } from '../infra/logger.js';
import { KeyedLock } from './KeyedLock.js';

interface CredentialServiceOptions {
  refreshSkewMs: number;
  clock?: () => Date;
  lock?: KeyedLock;
}

/**
 * CredentialService - hands workers a usable credential for a job's owner
 *
 * Refresh for one owner is single-writer: a KeyedLock serializes it within the
 * process and the session version compare-and-set serializes it across
 * processes. Whoever loses either race reads the winner's token.
 */
export class CredentialService {
  private refreshSkewMs: number;
  private clock: () => Date;
  private lock: KeyedLock;

  constructor(
    private sessionRepo: SessionRepository,
    private refresher: TokenRefresher,
    options: CredentialServiceOptions
  ) {
    this.refreshSkewMs = options.refreshSkewMs;
    this.clock = options.clock ?? (() => new Date());
    this.lock = options.lock ?? new KeyedLock();
  }

  async resolve(ownerId: string, options: { forceRefresh?: boolean } = {}): Promise<CredentialData> {
    const session = this.requireSession(ownerId);
    if (!options.forceRefresh && !this.needsRefresh(session.credentialData)) {
      return session.credentialData;
    }

    return this.lock.run(ownerId, () => this.refresh(ownerId, session.version));
  }

  private async refresh(ownerId: string, observedVersion: number): Promise<CredentialData> {
    // Someone may have refreshed while this call waited for the lock
    const current = this.requireSession(ownerId);
    if (current.version !== observedVersion && !this.needsRefresh(current.credentialData)) {
      logger.debug('Credential already refreshed by another caller', { ownerId });
      return current.credentialData;
    }

    logger.info('Refreshing user credential', { ownerId });
    const refreshed = await this.refresher.refresh(current.credentialData);

    const applied = this.sessionRepo.updateCredentials({
      ownerId,
      credentialData: refreshed,
      expectedVersion: current.version,
      now: this.clock(),
    });

    if (applied) {
      logger.info('User credential refreshed', { ownerId });
      return refreshed;
    }

    const winner = this.requireSession(ownerId);
    logger.info('Concurrent credential refresh detected, using stored credential', { ownerId });
    return winner.credentialData;
  }

  private needsRefresh(credential: CredentialData): boolean {
    return isCredentialExpired(credential, this.clock().getTime(), this.refreshSkewMs);
  }

  private requireSession(ownerId: string): Session & { credentialData: CredentialData } {
    const session = this.sessionRepo.getByOwner(ownerId);
    if (!session || !session.authenticated || !session.credentialData) {
      throw new FatalExecutionError(
        'No authenticated session for job owner',
        'SESSION_NOT_AUTHENTICATED',
        { ownerId }
      );
    }
    return { ...session, credentialData: session.credentialData };
  }
}
