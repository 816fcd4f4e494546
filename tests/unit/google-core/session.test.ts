/**
 * Unit tests for the OAuth session.
 */

import { describe, it, expect, vi } from 'vitest';
import { GoogleSession, REFRESH_THRESHOLD_MS } from '../../../src/domains/google-core/providers/session.js';
import type { StoredCredential } from '../../../src/services/credentials/index.js';
import { AuthenticationError } from '../../../src/utils/errors.js';

const NOW = 1_700_000_000_000;

function credential(overrides: Partial<StoredCredential> = {}): StoredCredential {
  return {
    accessToken: 'stored-token',
    refreshToken: 'test-refresh-token',
    expiresAt: NOW + 3600000,
    ...overrides,
  };
}

describe('GoogleSession', () => {
  it('uses the stored token while it is fresh', async () => {
    const refresh = vi.fn();
    const session = new GoogleSession(credential(), { refresh, now: () => NOW });

    await expect(session.accessToken()).resolves.toBe('stored-token');
    expect(refresh).not.toHaveBeenCalled();
  });

  it('refreshes a token that expires within five minutes and persists it', async () => {
    const refresh = vi.fn(async () => ({ accessToken: 'fresh-token', expiresAt: NOW + 3600000 }));
    const persist = vi.fn(async (_credential: StoredCredential) => {});
    const session = new GoogleSession(
      credential({ expiresAt: NOW + REFRESH_THRESHOLD_MS - 1 }),
      { refresh, persist, now: () => NOW }
    );

    await expect(session.accessToken()).resolves.toBe('fresh-token');

    expect(refresh).toHaveBeenCalledWith('test-refresh-token');
    expect(persist).toHaveBeenCalledWith({
      accessToken: 'fresh-token',
      refreshToken: 'test-refresh-token',
      expiresAt: NOW + 3600000,
    });
  });

  it('keeps a rotated refresh token', async () => {
    const refresh = vi.fn(async () => ({
      accessToken: 'fresh-token',
      expiresAt: NOW + 3600000,
      refreshToken: 'rotated-refresh-token',
    }));
    const session = new GoogleSession(credential(), { refresh, now: () => NOW });

    await session.forceRefresh();

    expect(session.current.refreshToken).toBe('rotated-refresh-token');
  });

  it('fails with AuthenticationError when no refresh token is stored', async () => {
    const session = new GoogleSession(
      credential({ refreshToken: undefined, expiresAt: NOW - 1 }),
      { refresh: vi.fn(), now: () => NOW }
    );

    await expect(session.accessToken()).rejects.toThrow(AuthenticationError);
  });

  it('fails with AuthenticationError when the refresh is rejected', async () => {
    const refresh = vi.fn(async () => {
      throw new Error('invalid_grant');
    });
    const session = new GoogleSession(credential({ expiresAt: NOW - 1 }), { refresh, now: () => NOW });

    await expect(session.accessToken()).rejects.toThrow('Token refresh failed: invalid_grant');
  });

  it('returns copies of the current credential', () => {
    const session = new GoogleSession(credential(), { refresh: vi.fn(), now: () => NOW });
    const snapshot = session.current;
    snapshot.accessToken = 'tampered';

    expect(session.current.accessToken).toBe('stored-token');
  });
});
