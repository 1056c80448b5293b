/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (the pg pool) and shares them.
 * - Picks the UserRepositoryPort adapter; nothing below this file knows which one.
 * - Tests swap adapters in through `overrides` (fakes behind the same port).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (which store to use) belong HERE.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule, InMemUserRepo, PostgresUserRepo } from '../modules/users';
import type { UserModule, UserRepositoryPort } from '../modules/users';

/** Every repository adapter the app uses, grouped so they are built in one place. */
export type Repositories = {
  userRepo: UserRepositoryPort;
};

export type AppDeps = {
  db: Db | null;
  logger: Logger;

  repositories: Repositories;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

/** Postgres adapters when a pool exists, in-memory ones otherwise. */
export function createRepositories(db: Db | null): Repositories {
  if (db) {
    return { userRepo: new PostgresUserRepo(db) };
  }

  return { userRepo: new InMemUserRepo() };
}

export type DepsOverrides = {
  repositories?: Partial<Repositories>;
};

export async function buildDeps(
  config: AppConfig,
  overrides: DepsOverrides = {},
): Promise<AppDeps> {
  const db = config.storage.driver === 'postgres' ? createDb(config.storage) : null;

  const repositories: Repositories = {
    ...createRepositories(db),
    ...overrides.repositories,
  };

  logger.level = config.logLevel;
  logger.info('deps.storage', { driver: config.storage.driver });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ userRepo: repositories.userRepo, logger });

  return {
    db,
    logger,
    repositories,
    users,
    close: async () => {
      await db?.destroy();
    },
  };
}
