import type { IStorage } from '../interfaces/index.js';
import type { EphemeralStore } from '../interfaces/ephemeral-store.js';
import type { Logger } from '../../logging/logger.js';
import { createPostgresClient, closePostgresClient } from './client.js';
import { PostgresCredentialStorage } from './repositories/credential-repository.js';
import { PostgresMagicLinkStorage } from './repositories/magic-link-repository.js';

export { createPostgresClient, closePostgresClient, type Database, type PostgresClient } from './client.js';
export { PostgresCredentialStorage } from './repositories/credential-repository.js';
export { PostgresMagicLinkStorage } from './repositories/magic-link-repository.js';
export * as schema from './schema.js';

export interface PostgresStorageOptions {
  databaseUrl: string;
  logger: Logger;
  /**
   * Fast marker store to pair with the database (usually Redis)
   */
  ephemeral?: EphemeralStore & { close?(): Promise<void> };
}

/**
 * Create a complete PostgreSQL storage implementation
 */
export function createPostgresStorage(options: PostgresStorageOptions): IStorage {
  const client = createPostgresClient(options.databaseUrl, options.logger);
  const { ephemeral } = options;

  return {
    credentials: new PostgresCredentialStorage(client.db),
    magicLinks: new PostgresMagicLinkStorage(client.db),
    ephemeral,
    close: async () => {
      await closePostgresClient(client);
      if (ephemeral?.close) {
        await ephemeral.close();
      }
    },
  };
}
