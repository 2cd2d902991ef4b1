import type { CredentialData } from '../../domain/entities/Session.js';

/**
 * Exchanges a refresh token for fresh credential material at the provider's token endpoint
 */
export interface TokenRefresher {
  refresh(credential: CredentialData): Promise<CredentialData>;
}
