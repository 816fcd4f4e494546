/**
 * @fileoverview In-memory token store for testing.
 *
 * Data is lost on process restart. Use only for tests.
 */

import type { StoredCredential, TokenStore } from './types.js';

/**
 * In-memory token store for testing.
 */
export class MemoryTokenStore implements TokenStore {
  private credential: StoredCredential | null;

  constructor(initial: StoredCredential | null = null) {
    this.credential = initial;
  }

  async load(): Promise<StoredCredential | null> {
    return this.credential;
  }

  async save(credential: StoredCredential): Promise<void> {
    this.credential = { ...credential };
  }
}
