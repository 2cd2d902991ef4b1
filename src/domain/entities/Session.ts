/**
 * Session entity - stored OAuth credential and scope state for one user
 * Keyed by ownerId; at most one record per user.
 */

export interface CredentialData {
  accessToken: string;
  refreshToken: string | null;
  /** Epoch milliseconds; null when the provider did not report an expiry */
  expiresAt: number | null;
  tokenType: string;
  scopes: string[];
}

export interface SessionProfile {
  email: string;
  name: string;
  picture: string;
}

export interface Session {
  ownerId: string;
  credentialData: CredentialData | null;
  requestedScopes: string[];
  grantedScopes: string[];
  authenticated: boolean;
  profile: SessionProfile | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export type SessionFields = Partial<
  Pick<
    Session,
    'credentialData' | 'requestedScopes' | 'grantedScopes' | 'authenticated' | 'profile'
  >
>;

/**
 * Creates a session for a user the store has not seen yet
 */
export function createSession(ownerId: string, fields: SessionFields, now = new Date()): Session {
  return {
    ownerId,
    credentialData: fields.credentialData ?? null,
    requestedScopes: dedupe(fields.requestedScopes ?? []),
    grantedScopes: dedupe(fields.grantedScopes ?? []),
    authenticated: fields.authenticated ?? false,
    profile: fields.profile ?? null,
    version: 1,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * Merges provided fields over an existing session; absent fields keep their value
 */
export function mergeSession(existing: Session, fields: SessionFields, now = new Date()): Session {
  return {
    ...existing,
    credentialData:
      fields.credentialData !== undefined ? fields.credentialData : existing.credentialData,
    requestedScopes:
      fields.requestedScopes !== undefined
        ? dedupe(fields.requestedScopes)
        : existing.requestedScopes,
    grantedScopes:
      fields.grantedScopes !== undefined ? dedupe(fields.grantedScopes) : existing.grantedScopes,
    authenticated: fields.authenticated ?? existing.authenticated,
    profile: fields.profile !== undefined ? fields.profile : existing.profile,
    version: existing.version + 1,
    updatedAt: now,
  };
}

/**
 * Intersects requested capabilities with the granted scopes
 * Keeps the caller's order and drops duplicates.
 */
export function filterScopes(session: Session, requested: Iterable<string>): string[] {
  const granted = new Set(session.grantedScopes);
  const allowed: string[] = [];
  for (const scope of requested) {
    if (granted.has(scope) && !allowed.includes(scope)) {
      allowed.push(scope);
    }
  }
  return allowed;
}

export function isCredentialExpired(
  credential: CredentialData,
  nowMs: number,
  skewMs = 0
): boolean {
  if (credential.expiresAt === null) return false;
  return credential.expiresAt - skewMs <= nowMs;
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}
