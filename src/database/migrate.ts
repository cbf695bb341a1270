import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { CustomLoggerService } from '../common/services/logger.service';
import { toError } from '../common/utils/to-error';
import { DatabaseClient } from './database.client';

/**
 * Applies `*.sql` files from MIGRATIONS_DIR in name order, each in its own
 * transaction, skipping the ones already recorded in schema_migrations.
 */
async function migrate(): Promise<void> {
  const logger = new CustomLoggerService();
  logger.setContext('Migrations');

  const directory = process.env.MIGRATIONS_DIR ?? join(process.cwd(), 'src/database/migrations');
  const db = await DatabaseClient.initialize();

  try {
    await db.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
        name TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )`,
    );

    const applied = await db.query<{ name: string }>('SELECT name FROM schema_migrations');
    const done = new Set(applied.rows.map(row => row.name));

    const files = (await readdir(directory)).filter(file => file.endsWith('.sql')).sort();
    for (const file of files) {
      if (done.has(file)) continue;

      const sql = await readFile(join(directory, file), 'utf8');
      await db.transaction(async client => {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
      });
      logger.log(`Applied ${file}`, { database: db.databaseName });
    }

    logger.log('Database migrations are up to date', { files: files.length });
  } finally {
    await db.disconnect();
  }
}

migrate().catch((error: unknown) => {
  const logger = new CustomLoggerService();
  logger.setContext('Migrations');
  logger.logError(toError(error), { stage: 'migrate' });
  process.exit(1);
});
