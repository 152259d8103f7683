/**
 * TokenManager - owns the panel admin credential
 *
 * Returns the cached credential while it is valid and re-authenticates on expiry
 * or on demand (401 path). Authentication is coalesced: however many callers need
 * a fresh credential at once, a single authenticate call is in flight and all of
 * them await its result.
 */

import { Logger } from '../core/Logger';
import { Clock, MS_PER_SECOND, systemClock } from '../../types/CommonTypes';
import type { Credential, CredentialProvider } from '../../types/HttpTypes';

export interface Authenticator {
  authenticate(): Promise<Credential>;
}

export interface TokenManagerConfig {
  /** Lifetime assumed when the panel does not report one */
  defaultTokenTtlSeconds: number;
  /** Refresh this long before the expiry to avoid signing with a dying token */
  refreshSkewSeconds: number;
}

export const DEFAULT_TOKEN_MANAGER_CONFIG: TokenManagerConfig = {
  defaultTokenTtlSeconds: 3600,
  refreshSkewSeconds: 30,
};

export class TokenManager implements CredentialProvider {
  private credential: Credential | null = null;
  private refreshing: Promise<Credential> | null = null;

  constructor(
    private readonly authenticator: Authenticator,
    private readonly logger: Logger,
    private readonly config: TokenManagerConfig = DEFAULT_TOKEN_MANAGER_CONFIG,
    private readonly clock: Clock = systemClock
  ) {}

  async getCredential(): Promise<Credential> {
    const current = this.credential;
    if (current && !this.isExpired(current)) {
      return current;
    }
    return this.refresh('expired');
  }

  /**
   * Re-authenticate regardless of the cached credential's age.
   * Joins a refresh already in flight rather than starting a second one.
   */
  async forceRefresh(): Promise<Credential> {
    return this.refresh('forced');
  }

  invalidate(): void {
    this.credential = null;
  }

  hasValidCredential(): boolean {
    return this.credential !== null && !this.isExpired(this.credential);
  }

  private refresh(reason: 'expired' | 'forced'): Promise<Credential> {
    if (this.refreshing) {
      return this.refreshing;
    }

    this.logger.debug('Authenticating with panel', { reason });
    const pending = Promise.resolve()
      .then(() => this.authenticator.authenticate())
      .then((credential) => {
        const stored: Credential = Object.freeze({ ...credential });
        this.credential = stored;
        this.logger.info('Panel credential obtained', { reason });
        return stored;
      })
      .finally(() => {
        if (this.refreshing === pending) {
          this.refreshing = null;
        }
      });

    this.refreshing = pending;
    return pending;
  }

  private isExpired(credential: Credential): boolean {
    const expiresAt =
      credential.expiresAt ?? credential.issuedAt + this.config.defaultTokenTtlSeconds * MS_PER_SECOND;
    return this.clock() >= expiresAt - this.config.refreshSkewSeconds * MS_PER_SECOND;
  }
}
