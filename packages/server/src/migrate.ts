import { readdir, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import pg from 'pg';
import { loadConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';

/**
 * Apply pending SQL migrations from ../migrations in file-name order
 */
const migrationsDir = fileURLToPath(new URL('../migrations/', import.meta.url));

const config = loadConfig();
const logger = createLogger({ level: config.logging.level, bindings: { service: 'authgate-migrate' } });

if (!config.database.url) {
  logger.error('DATABASE_URL is not set');
  process.exit(1);
}

const client = new pg.Client({ connectionString: config.database.url });
await client.connect();

try {
  await client.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`
  );

  const applied = await client.query<{ name: string }>('SELECT name FROM schema_migrations');
  const done = new Set(applied.rows.map((row) => row.name));

  const files = (await readdir(migrationsDir)).filter((file) => file.endsWith('.sql')).sort();

  for (const file of files) {
    if (done.has(file)) {
      continue;
    }

    const sql = await readFile(`${migrationsDir}${file}`, 'utf-8');

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }

    logger.info('Migration applied', { migration: file });
  }
} catch (error) {
  logger.error('Migration failed', { error });
  process.exitCode = 1;
} finally {
  await client.end();
}
