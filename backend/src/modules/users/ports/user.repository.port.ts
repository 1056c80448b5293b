/**
 * backend/src/modules/users/ports/user.repository.port.ts
 *
 * WHY:
 * - The service depends on this contract, never on a concrete store.
 * - Adapters (Postgres, in-memory) implement it; the composition root picks one.
 *
 * CONTRACT:
 * - Every method rejects with UserDomainError only.
 * - A missing user is always NOT_FOUND, whatever the shape of the id.
 * - deleteUser is not idempotent: a second delete of the same id is NOT_FOUND.
 */

import type { CreateUser, UpdateUser, User, UserId } from '../user.types';

export interface UserRepositoryPort {
  /** Rejects CONFLICT on a duplicate email, VALIDATION on a constraint violation. */
  createUser(input: CreateUser): Promise<User>;

  /** Rejects NOT_FOUND when no user has this id. */
  getUser(id: UserId): Promise<User>;

  /** Rejects NOT_FOUND without creating a row; CONFLICT on a duplicate email. */
  updateUser(input: UpdateUser): Promise<User>;

  /** Rejects NOT_FOUND when no user has this id. */
  deleteUser(id: UserId): Promise<void>;
}
