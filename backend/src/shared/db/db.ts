/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection over a pg pool.
 * - The pool is the only state shared between concurrent requests; checkout/return
 *   and max size are owned by pg, not by this code.
 *
 * HOW TO USE:
 * - Created once in app/di.ts and destroyed on shutdown (`db.destroy()`).
 * - Table types live in ./schema.ts and must follow the migrations.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/** What DAL adapters and query helpers accept. */
export type DbExecutor = Kysely<DB>;

export type CreateDbOptions = {
  databaseUrl: string;
  poolMax: number;
};

export function createDb(opts: CreateDbOptions): Db {
  const pool = new pg.Pool({
    connectionString: opts.databaseUrl,
    max: opts.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
