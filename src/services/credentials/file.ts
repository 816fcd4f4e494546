/**
 * @fileoverview File-backed token store and client secrets loader.
 *
 * The token file uses the same JSON shape google-auth-library produces
 * (`access_token`, `refresh_token`, `expiry_date`, ...), so a token written
 * by other Google tooling can be reused. Writes go to a temp file in the
 * same directory and are renamed over the target.
 */

import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';
import { MissingCredentialsError, errorMessage } from '../../utils/errors.js';
import type { ClientSecrets, StoredCredential, TokenStore } from './types.js';

/** Default lifetime assumed when a token file carries no expiry. */
const DEFAULT_TOKEN_LIFETIME_MS = 3600000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Decode a parsed token file into a StoredCredential.
 * Returns null when the document has no usable access token.
 */
export function parseTokenDocument(doc: unknown, fileMtimeMs = Date.now()): StoredCredential | null {
  if (!isRecord(doc)) return null;

  const accessToken = optionalString(doc.access_token) ?? optionalString(doc.token);
  if (!accessToken) return null;

  const expiresAt = typeof doc.expiry_date === 'number'
    ? doc.expiry_date
    : fileMtimeMs + DEFAULT_TOKEN_LIFETIME_MS;

  return {
    accessToken,
    refreshToken: optionalString(doc.refresh_token),
    expiresAt,
    scope: optionalString(doc.scope),
    tokenType: optionalString(doc.token_type),
  };
}

/**
 * Encode a StoredCredential in the google-auth-library token shape.
 */
export function toTokenDocument(credential: StoredCredential): Record<string, unknown> {
  return {
    access_token: credential.accessToken,
    refresh_token: credential.refreshToken,
    expiry_date: credential.expiresAt,
    scope: credential.scope,
    token_type: credential.tokenType ?? 'Bearer',
  };
}

/**
 * Token store persisted as a JSON file.
 */
export class FileTokenStore implements TokenStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<StoredCredential | null> {
    let text: string;
    let mtimeMs: number;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
      mtimeMs = (await fs.stat(this.filePath)).mtimeMs;
    } catch (error) {
      if (isMissingFileError(error)) return null;
      throw error;
    }

    let doc: unknown;
    try {
      doc = JSON.parse(text);
    } catch (error) {
      throw new MissingCredentialsError(
        `Token file at ${this.filePath} is not valid JSON (${errorMessage(error)}). Run the auth command again.`,
        { path: this.filePath }
      );
    }
    return parseTokenDocument(doc, mtimeMs);
  }

  async save(credential: StoredCredential): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });

    const tempPath = path.join(dir, `.${path.basename(this.filePath)}.${randomBytes(6).toString('hex')}.tmp`);
    await fs.writeFile(tempPath, JSON.stringify(toTokenDocument(credential), null, 2), {
      encoding: 'utf-8',
      mode: 0o600,
    });
    await fs.rename(tempPath, this.filePath);
  }
}

/**
 * Read the OAuth client secrets file downloaded from the Google Cloud console.
 * Accepts both the "installed" (desktop) and "web" layouts.
 *
 * @throws MissingCredentialsError if the file is absent or unusable
 */
export async function loadClientSecrets(filePath: string, fallbackRedirectUri: string): Promise<ClientSecrets> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new MissingCredentialsError(
        `OAuth client secrets not found at ${filePath}. Download credentials.json from the Google Cloud console.`,
        { path: filePath }
      );
    }
    throw error;
  }

  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch {
    throw new MissingCredentialsError(`OAuth client secrets at ${filePath} are not valid JSON`, { path: filePath });
  }

  const section = isRecord(doc) ? (isRecord(doc.installed) ? doc.installed : doc.web) : undefined;
  if (!isRecord(section)) {
    throw new MissingCredentialsError(
      `OAuth client secrets at ${filePath} must contain an "installed" or "web" section`,
      { path: filePath }
    );
  }

  const clientId = optionalString(section.client_id);
  const clientSecret = optionalString(section.client_secret);
  if (!clientId || !clientSecret) {
    throw new MissingCredentialsError(
      `OAuth client secrets at ${filePath} are missing client_id or client_secret`,
      { path: filePath }
    );
  }

  const redirectUris = Array.isArray(section.redirect_uris) ? section.redirect_uris : [];
  const redirectUri = optionalString(redirectUris[0]) ?? fallbackRedirectUri;

  return { clientId, clientSecret, redirectUri };
}
