export * from './credential-storage.js';
export * from './magic-link-storage.js';
export * from './ephemeral-store.js';

import type { CredentialStorage } from './credential-storage.js';
import type { MagicLinkStorage } from './magic-link-storage.js';
import type { EphemeralStore } from './ephemeral-store.js';

/**
 * Complete storage interface for the auth server
 */
export interface IStorage {
  credentials: CredentialStorage;
  magicLinks: MagicLinkStorage;
  /**
   * Fast marker store; when absent the durable conditional updates alone
   * guard single use
   */
  ephemeral?: EphemeralStore;
  /**
   * Release pools and connections
   */
  close(): Promise<void>;
}
