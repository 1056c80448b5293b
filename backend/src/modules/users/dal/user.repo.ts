/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Postgres adapter for UserRepositoryPort.
 * - One statement per operation over the shared pool; no transactions, no retries.
 * - Translates store failures into UserDomainError:
 *   unique violation -> CONFLICT, constraint/data errors -> VALIDATION, rest -> STORE_FAILURE.
 *
 * RULES:
 * - Row shapes (snake_case) never leave this folder.
 */

import { sql, type Updateable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';
import { classifyPgError, getPgConstraint } from '../../../shared/db/pg-errors';
import type { UserRepositoryPort } from '../ports/user.repository.port';
import { UserErrors, isUserDomainError } from '../user.errors';
import type { CreateUser, UpdateUser, User, UserId } from '../user.types';
import { selectUserByIdSql, type UserRow } from './user.query-sql';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

type UserOperation = 'create' | 'get' | 'update' | 'delete';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    age: row.age,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function translateUserStoreError(
  err: unknown,
  operation: UserOperation,
  meta: Record<string, unknown> = {},
) {
  if (isUserDomainError(err)) return err;

  switch (classifyPgError(err)) {
    case 'unique_violation':
      return UserErrors.emailTaken({ ...meta, constraint: getPgConstraint(err) }, err);
    case 'invalid_data':
      return UserErrors.invalidData({ ...meta, constraint: getPgConstraint(err) }, err);
    case 'other':
      return UserErrors.storeFailure(operation, err);
  }
}

export class PostgresUserRepo implements UserRepositoryPort {
  constructor(private readonly db: DbExecutor) {}

  async createUser(input: CreateUser): Promise<User> {
    try {
      const row = await this.db
        .insertInto('users')
        .values({
          name: input.name,
          email: input.email,
          age: input.age,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      return toUser(row);
    } catch (err) {
      throw translateUserStoreError(err, 'create');
    }
  }

  async getUser(id: UserId): Promise<User> {
    // Postgres rejects malformed uuids with 22P02; for callers that is just a missing user.
    if (!UUID_PATTERN.test(id)) throw UserErrors.notFound({ userId: id });

    let row: UserRow | undefined;
    try {
      row = await selectUserByIdSql(this.db, id);
    } catch (err) {
      throw translateUserStoreError(err, 'get', { userId: id });
    }

    if (!row) throw UserErrors.notFound({ userId: id });
    return toUser(row);
  }

  /**
   * Single UPDATE ... RETURNING that only touches supplied fields, so a missing
   * row comes back empty instead of being created.
   */
  async updateUser(input: UpdateUser): Promise<User> {
    if (!UUID_PATTERN.test(input.id)) throw UserErrors.notFound({ userId: input.id });

    const patch: Updateable<UsersTable> = {};
    if (input.name !== undefined) patch.name = input.name;
    if (input.email !== undefined) patch.email = input.email;
    if (input.age !== undefined) patch.age = input.age;

    let row: UserRow | undefined;
    try {
      row = await this.db
        .updateTable('users')
        .set({ ...patch, updated_at: sql<Date>`now()` })
        .where('id', '=', input.id)
        .returningAll()
        .executeTakeFirst();
    } catch (err) {
      throw translateUserStoreError(err, 'update', { userId: input.id });
    }

    if (!row) throw UserErrors.notFound({ userId: input.id });
    return toUser(row);
  }

  async deleteUser(id: UserId): Promise<void> {
    if (!UUID_PATTERN.test(id)) throw UserErrors.notFound({ userId: id });

    let deleted: number;
    try {
      const res = await this.db.deleteFrom('users').where('id', '=', id).executeTakeFirst();
      deleted = Number(res?.numDeletedRows ?? 0);
    } catch (err) {
      throw translateUserStoreError(err, 'delete', { userId: id });
    }

    if (deleted === 0) throw UserErrors.notFound({ userId: id });
  }
}
