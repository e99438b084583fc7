import type { IStorage } from '../interfaces/index.js';
import type { App, Clock } from '../../types/index.js';
import { MemoryCredentialStorage } from './credential-storage.js';
import { MemoryMagicLinkStorage } from './magic-link-storage.js';
import { MemoryEphemeralStore } from './ephemeral-store.js';

export { MemoryCredentialStorage } from './credential-storage.js';
export { MemoryMagicLinkStorage } from './magic-link-storage.js';
export { MemoryEphemeralStore } from './ephemeral-store.js';

export interface MemoryStorageOptions {
  /**
   * Applications available from the start
   */
  apps?: App[];
  /**
   * Clock for marker expiry in the ephemeral store
   */
  clock?: Clock;
  /**
   * Run without a fast marker store (default: with one)
   */
  withoutEphemeral?: boolean;
}

export interface MemoryStorage extends IStorage {
  credentials: MemoryCredentialStorage;
  magicLinks: MemoryMagicLinkStorage;
}

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(options: MemoryStorageOptions = {}): MemoryStorage {
  const { apps = [], clock, withoutEphemeral = false } = options;

  return {
    credentials: new MemoryCredentialStorage(apps),
    magicLinks: new MemoryMagicLinkStorage(),
    ephemeral: withoutEphemeral ? undefined : new MemoryEphemeralStore(clock),
    close: async () => {},
  };
}
