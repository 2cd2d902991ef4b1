import { z } from 'zod';
import { FatalExecutionError, RetriableExecutionError } from '../../domain/errors.js';
import type { CredentialData } from '../../domain/entities/Session.js';
import type { Env } from '../env.js';
import { logger } from '../logger.js';
import type { TokenRefresher } from './TokenRefresher.js';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().positive().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  token_type: z.string().default('Bearer'),
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

type FetchFn = typeof fetch;

interface GoogleTokenRefresherOptions {
  clientId: string | undefined;
  clientSecret: string | undefined;
  tokenUri: string;
  fetchFn?: FetchFn;
  clock?: () => Date;
}

/**
 * Refreshes Google OAuth access tokens with the refresh_token grant
 */
export class GoogleTokenRefresher implements TokenRefresher {
  private fetchFn: FetchFn;
  private clock: () => Date;

  constructor(private options: GoogleTokenRefresherOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.clock = options.clock ?? (() => new Date());
  }

  async refresh(credential: CredentialData): Promise<CredentialData> {
    const { clientId, clientSecret, tokenUri } = this.options;
    if (!clientId || !clientSecret) {
      throw new FatalExecutionError(
        'OAuth client is not configured for credential refresh',
        'CREDENTIAL_REFRESH_UNAVAILABLE'
      );
    }
    if (!credential.refreshToken) {
      throw new FatalExecutionError(
        'Credential has no refresh token; the user must re-authorize',
        'CREDENTIAL_NOT_REFRESHABLE'
      );
    }

    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: credential.refreshToken,
      client_id: clientId,
      client_secret: clientSecret,
    });

    let response: Response;
    try {
      response = await this.fetchFn(tokenUri, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body,
      });
    } catch (error) {
      logger.warn('Token endpoint unreachable', {
        tokenUri,
        message: error instanceof Error ? error.message : String(error),
      });
      throw new RetriableExecutionError('Token endpoint unreachable', 'CREDENTIAL_REFRESH_FAILED');
    }

    const payload: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const parsedError = tokenErrorSchema.safeParse(payload);
      const providerError = parsedError.success ? parsedError.data.error : null;
      logger.warn('Token refresh rejected', { status: response.status, providerError });

      if (response.status >= 500 || response.status === 429) {
        throw new RetriableExecutionError(
          `Token endpoint returned ${response.status}`,
          'CREDENTIAL_REFRESH_FAILED',
          { status: response.status }
        );
      }
      throw new FatalExecutionError(
        `Token refresh rejected: ${providerError ?? `HTTP ${response.status}`}`,
        'CREDENTIAL_REVOKED',
        { status: response.status }
      );
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new RetriableExecutionError(
        'Token endpoint returned an unexpected payload',
        'CREDENTIAL_REFRESH_FAILED',
        { issues: parsed.error.issues }
      );
    }

    const token = parsed.data;
    return {
      accessToken: token.access_token,
      refreshToken: token.refresh_token ?? credential.refreshToken,
      expiresAt:
        token.expires_in !== undefined ? this.clock().getTime() + token.expires_in * 1000 : null,
      tokenType: token.token_type,
      scopes: token.scope ? token.scope.split(' ').filter(Boolean) : credential.scopes,
    };
  }
}

export function createGoogleTokenRefresher(
  env: Pick<Env, 'GOOGLE_CLIENT_ID' | 'GOOGLE_CLIENT_SECRET' | 'GOOGLE_TOKEN_URI'>
): GoogleTokenRefresher {
  return new GoogleTokenRefresher({
    clientId: env.GOOGLE_CLIENT_ID,
    clientSecret: env.GOOGLE_CLIENT_SECRET,
    tokenUri: env.GOOGLE_TOKEN_URI,
  });
}
