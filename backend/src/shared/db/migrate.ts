/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Applies schema migrations (src/shared/db/migrations) to the configured database.
 * - Run with `tsx`, so Kysely's FileMigrationProvider can import `.ts` migrations.
 *
 * HOW TO USE:
 * - npm run db:migrate            (migrate to latest)
 * - npm run db:migrate -- down    (revert the last migration)
 */

import 'dotenv/config';

import path from 'node:path';
import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { FileMigrationProvider, Migrator } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const migrationFolder = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations');

async function runMigrations(direction: 'up' | 'down'): Promise<void> {
  const config = buildConfig();

  if (config.storage.driver !== 'postgres') {
    logger.warn('migrations.skipped', { reason: 'storage driver is not postgres' });
    return;
  }

  const db = createDb(config.storage);

  try {
    const migrator = new Migrator({
      db,
      provider: new FileMigrationProvider({ fs, path, migrationFolder }),
    });

    const { error, results } =
      direction === 'down' ? await migrator.migrateDown() : await migrator.migrateToLatest();

    results?.forEach((r) => {
      if (r.status === 'Success')
        logger.info('migration.success', { migration: r.migrationName, direction });
      if (r.status === 'Error')
        logger.error('migration.error', { migration: r.migrationName, direction });
    });

    if (error) {
      throw error;
    }

    logger.info('migrations.done', { direction });
  } finally {
    await db.destroy();
  }
}

const direction = process.argv[2] === 'down' ? 'down' : 'up';

void runMigrations(direction).catch((err: unknown) => {
  logger.error('migrations.failed', { err });
  process.exit(1);
});
