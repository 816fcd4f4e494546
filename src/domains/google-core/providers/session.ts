/**
 * @fileoverview Explicit OAuth session threaded through every Gmail call.
 *
 * Holds the current credential, refreshes it through an injected callback
 * and persists refreshed tokens through another. There is no process-wide
 * token state: whoever needs a token holds the session.
 */

import { AuthenticationError, errorMessage } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { StoredCredential } from '../../../services/credentials/index.js';

/** Token refresh threshold: refresh if expiring within 5 minutes. */
export const REFRESH_THRESHOLD_MS = 5 * 60 * 1000;

export interface RefreshedToken {
  accessToken: string;
  expiresAt: number;
  refreshToken?: string;
}

/** Exchanges a refresh token for a new access token. */
export type TokenRefresher = (refreshToken: string) => Promise<RefreshedToken>;

export interface SessionOptions {
  refresh: TokenRefresher;
  /** Called with every refreshed credential, e.g. to write the token file. */
  persist?: (credential: StoredCredential) => Promise<void>;
  /** Clock, injectable for expiry tests. */
  now?: () => number;
}

const logger = createLogger({ domain: 'google-core', operation: 'session' });

export class GoogleSession {
  private credential: StoredCredential;
  private readonly refresh: TokenRefresher;
  private readonly persist?: (credential: StoredCredential) => Promise<void>;
  private readonly now: () => number;

  constructor(credential: StoredCredential, options: SessionOptions) {
    this.credential = { ...credential };
    this.refresh = options.refresh;
    this.persist = options.persist;
    this.now = options.now ?? Date.now;
  }

  /** Snapshot of the credential currently in use. */
  get current(): StoredCredential {
    return { ...this.credential };
  }

  isExpiring(): boolean {
    return this.credential.expiresAt < this.now() + REFRESH_THRESHOLD_MS;
  }

  /**
   * Get a usable access token, refreshing first if it is about to expire.
   * @throws AuthenticationError if a needed refresh fails
   */
  async accessToken(): Promise<string> {
    if (this.isExpiring()) {
      await this.forceRefresh('expiring');
    }
    return this.credential.accessToken;
  }

  /**
   * Refresh regardless of expiry (after the provider answered 401/403).
   * @throws AuthenticationError if there is no refresh token or the refresh fails
   */
  async forceRefresh(reason: 'expiring' | 'rejected' = 'rejected'): Promise<string> {
    const refreshToken = this.credential.refreshToken;
    if (!refreshToken) {
      throw new AuthenticationError(
        'Access token expired or was rejected and no refresh token is stored. Run `gmail-query-cli auth` again.'
      );
    }

    let refreshed: RefreshedToken;
    try {
      refreshed = await this.refresh(refreshToken);
    } catch (error) {
      logger.warn('token_refresh_failed', { reason, error: errorMessage(error) });
      throw new AuthenticationError(`Token refresh failed: ${errorMessage(error)}`);
    }

    this.credential = {
      ...this.credential,
      accessToken: refreshed.accessToken,
      expiresAt: refreshed.expiresAt,
      refreshToken: refreshed.refreshToken ?? refreshToken,
    };

    logger.info('token_refreshed', { reason, expiresAt: new Date(refreshed.expiresAt).toISOString() });

    if (this.persist) {
      await this.persist(this.current);
    }

    return this.credential.accessToken;
  }
}
