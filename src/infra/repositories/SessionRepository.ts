import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type {
  CredentialData,
  Session,
  SessionFields,
  SessionProfile,
} from '../../domain/entities/Session.js';
import { createSession, mergeSession } from '../../domain/entities/Session.js';
import { logger } from '../logger.js';

type SessionRow = {
  owner_id: string;
  credential_data: string | null;
  requested_scopes: string;
  granted_scopes: string;
  authenticated: number;
  profile: string | null;
  version: number;
  created_at: string;
  updated_at: string;
};

/**
 * Session store keyed by owner id
 * `version` is bumped on every write and doubles as the compare-and-set token
 * for credential refresh.
 */
export class SessionRepository {
  constructor(private db: DatabaseAdapter) {}

  getByOwner(ownerId: string): Session | null {
    const row = this.db.queryOne<SessionRow>('SELECT * FROM sessions WHERE owner_id = ?', [
      ownerId,
    ]);
    return row ? this.mapRowToSession(row) : null;
  }

  /**
   * Creates the session or merges fields into the existing one
   */
  upsert(ownerId: string, fields: SessionFields, now = new Date()): Session {
    return this.db.transaction(() => {
      const existing = this.getByOwner(ownerId);
      const session = existing
        ? mergeSession(existing, fields, now)
        : createSession(ownerId, fields, now);

      this.db.execute(
        `
        INSERT INTO sessions (
          owner_id, credential_data, requested_scopes, granted_scopes, authenticated,
          profile, version, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(owner_id) DO UPDATE SET
          credential_data = excluded.credential_data,
          requested_scopes = excluded.requested_scopes,
          granted_scopes = excluded.granted_scopes,
          authenticated = excluded.authenticated,
          profile = excluded.profile,
          version = excluded.version,
          updated_at = excluded.updated_at
        `,
        [
          session.ownerId,
          session.credentialData ? JSON.stringify(session.credentialData) : null,
          JSON.stringify(session.requestedScopes),
          JSON.stringify(session.grantedScopes),
          session.authenticated ? 1 : 0,
          session.profile ? JSON.stringify(session.profile) : null,
          session.version,
          session.createdAt.toISOString(),
          session.updatedAt.toISOString(),
        ]
      );

      logger.debug('Session upserted', { ownerId, version: session.version });
      return session;
    });
  }

  /**
   * Replaces credentials only if nobody wrote the session since `expectedVersion`
   */
  updateCredentials(params: {
    ownerId: string;
    credentialData: CredentialData;
    expectedVersion: number;
    now?: Date;
  }): boolean {
    const sql = `
      UPDATE sessions
      SET credential_data = ?, version = version + 1, updated_at = ?
      WHERE owner_id = ? AND version = ?
    `;

    const changes = this.db.execute(sql, [
      JSON.stringify(params.credentialData),
      (params.now ?? new Date()).toISOString(),
      params.ownerId,
      params.expectedVersion,
    ]);

    return changes === 1;
  }

  private mapRowToSession(row: SessionRow): Session {
    return {
      ownerId: row.owner_id,
      credentialData: row.credential_data
        ? (JSON.parse(row.credential_data) as CredentialData)
        : null,
      requestedScopes: JSON.parse(row.requested_scopes) as string[],
      grantedScopes: JSON.parse(row.granted_scopes) as string[],
      authenticated: row.authenticated === 1,
      profile: row.profile ? (JSON.parse(row.profile) as SessionProfile) : null,
      version: row.version,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
