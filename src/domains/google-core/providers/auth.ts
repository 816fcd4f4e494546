/**
 * @fileoverview Google OAuth utilities.
 *
 * Centralizes OAuth2 client creation, token refresh, the one-time consent
 * flow and session opening. Everything here talks to google-auth-library;
 * the rest of the code only sees GoogleSession.
 */

import { OAuth2Client, type Credentials } from 'google-auth-library';
import config from '../../../config.js';
import {
  createTokenStore,
  loadClientSecrets,
  type ClientSecrets,
  type StoredCredential,
  type TokenStore,
} from '../../../services/credentials/index.js';
import { AuthenticationError, MissingCredentialsError, errorMessage } from '../../../utils/errors.js';
import { GoogleSession, type TokenRefresher } from './session.js';

/** Single scope covering read, send and label modification. */
export const GMAIL_SCOPES = ['https://www.googleapis.com/auth/gmail.modify'];

/** Assumed token lifetime when Google omits expiry_date. */
const DEFAULT_EXPIRY_MS = 3600000;

/**
 * Create a bare OAuth2 client (no credentials set).
 */
export function createOAuth2Client(secrets: ClientSecrets): OAuth2Client {
  return new OAuth2Client(secrets.clientId, secrets.clientSecret, secrets.redirectUri);
}

/**
 * Build a TokenRefresher backed by Google's token endpoint.
 */
export function createGoogleRefresher(secrets: ClientSecrets): TokenRefresher {
  return async (refreshToken: string) => {
    const oauth2Client = createOAuth2Client(secrets);
    oauth2Client.setCredentials({ refresh_token: refreshToken });

    const { credentials } = await oauth2Client.refreshAccessToken();

    if (!credentials.access_token) {
      throw new Error('Failed to refresh access token');
    }

    return {
      accessToken: credentials.access_token,
      expiresAt: credentials.expiry_date || Date.now() + DEFAULT_EXPIRY_MS,
      refreshToken: credentials.refresh_token || undefined,
    };
  };
}

/**
 * URL the user opens to grant Gmail access.
 */
export function generateConsentUrl(secrets: ClientSecrets): string {
  const oauth2Client = createOAuth2Client(secrets);
  return oauth2Client.generateAuthUrl({
    access_type: 'offline',
    prompt: 'consent',
    scope: GMAIL_SCOPES,
  });
}

/**
 * Exchange an authorization code for tokens and persist them.
 *
 * @throws AuthenticationError if Google rejects the code
 */
export async function exchangeAuthorizationCode(
  secrets: ClientSecrets,
  code: string,
  store: TokenStore
): Promise<StoredCredential> {
  const oauth2Client = createOAuth2Client(secrets);

  let tokens: Credentials;
  try {
    const response = await oauth2Client.getToken(code);
    tokens = response.tokens;
  } catch (error) {
    throw new AuthenticationError(`Authorization code exchange failed: ${errorMessage(error)}`);
  }

  if (!tokens.access_token) {
    throw new AuthenticationError('Authorization code exchange returned no access token');
  }

  const credential: StoredCredential = {
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token || undefined,
    expiresAt: tokens.expiry_date || Date.now() + DEFAULT_EXPIRY_MS,
    scope: tokens.scope || undefined,
    tokenType: tokens.token_type || undefined,
  };
  await store.save(credential);
  return credential;
}

export interface OpenSessionOptions {
  credentialsPath?: string;
  store?: TokenStore;
  refresh?: TokenRefresher;
  now?: () => number;
}

/**
 * Load client secrets and the stored token, and wrap them in a session
 * whose refreshed tokens are written back to the store.
 *
 * @throws MissingCredentialsError if setup has not been completed
 */
export async function openSession(options: OpenSessionOptions = {}): Promise<GoogleSession> {
  const credentialsPath = options.credentialsPath ?? config.google.credentialsPath;
  const store = options.store ?? createTokenStore();

  const refresh = options.refresh
    ?? createGoogleRefresher(await loadClientSecrets(credentialsPath, config.google.redirectUri));

  const credential = await store.load();
  if (!credential) {
    throw new MissingCredentialsError(
      'No stored Gmail token. Run `gmail-query-cli auth` to authorize this CLI.'
    );
  }

  return new GoogleSession(credential, {
    refresh,
    persist: (updated) => store.save(updated),
    now: options.now,
  });
}
