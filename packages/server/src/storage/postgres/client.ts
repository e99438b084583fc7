import pg from 'pg';
import type { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from './schema.js';
import type { Logger } from '../../logging/logger.js';

export type Database = NodePgDatabase<typeof schema>;

export interface PostgresClient {
  db: Database;
  pool: Pool;
}

/**
 * Open a connection pool and wrap it with drizzle
 */
export function createPostgresClient(connectionString: string, logger: Logger): PostgresClient {
  const pool = new pg.Pool({ connectionString });

  // Idle clients can fail when the server drops them; log instead of crashing
  pool.on('error', (error) => {
    logger.error('Idle PostgreSQL client error', { op: 'postgres.pool', error });
  });

  return { db: drizzle(pool, { schema }), pool };
}

/**
 * Close the pool
 */
export async function closePostgresClient(client: PostgresClient): Promise<void> {
  await client.pool.end();
}
