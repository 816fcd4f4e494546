/**
 * @fileoverview Token store factory.
 *
 * Returns the file-backed store at the configured location. Tests pass a
 * MemoryTokenStore directly instead of going through this factory.
 */

import config from '../../config.js';
import { FileTokenStore } from './file.js';

export type { ClientSecrets, StoredCredential, TokenStore } from './types.js';
export { FileTokenStore, loadClientSecrets, parseTokenDocument, toTokenDocument } from './file.js';
export { MemoryTokenStore } from './memory.js';

/**
 * Create the token store for the configured token path.
 */
export function createTokenStore(tokenPath: string = config.google.tokenPath): FileTokenStore {
  return new FileTokenStore(tokenPath);
}
