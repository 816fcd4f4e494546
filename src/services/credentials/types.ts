/**
 * @fileoverview Token store interface for the persisted OAuth token.
 *
 * One token per installation. Implementations must replace the stored
 * token atomically: another invocation may refresh it concurrently.
 */

/**
 * OAuth credential stored for the authorized account.
 */
export interface StoredCredential {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number; // Unix timestamp in milliseconds
  scope?: string;
  tokenType?: string;
}

/**
 * OAuth client identity read from the client secrets file.
 */
export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

/**
 * Interface for token storage backends.
 */
export interface TokenStore {
  /**
   * Load the stored token.
   * @returns Credential or null if none has been stored.
   */
  load(): Promise<StoredCredential | null>;

  /**
   * Store the token, overwriting any existing one.
   */
  save(credential: StoredCredential): Promise<void>;
}
