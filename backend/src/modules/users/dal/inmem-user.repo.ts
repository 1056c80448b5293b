/**
 * backend/src/modules/users/dal/inmem-user.repo.ts
 *
 * WHY:
 * - Lets tests (and local dev without Postgres) run the whole app.
 * - Mirrors the Postgres constraints: unique email, age >= 0, store-assigned uuid.
 * - Ids match regardless of case, like Postgres uuid comparison.
 *
 * HOW TO USE:
 * - const repo = new InMemUserRepo()
 * - or STORAGE_DRIVER=memory
 */

import { randomUUID } from 'node:crypto';

import type { UserRepositoryPort } from '../ports/user.repository.port';
import { UserErrors } from '../user.errors';
import type { CreateUser, UpdateUser, User, UserId } from '../user.types';

export class InMemUserRepo implements UserRepositoryPort {
  private readonly users = new Map<UserId, User>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  private static key(id: UserId): UserId {
    return id.toLowerCase();
  }

  private findByEmail(email: string): User | undefined {
    for (const user of this.users.values()) {
      if (user.email === email) return user;
    }
    return undefined;
  }

  private isValidAge(age: number | null): boolean {
    return age === null || (Number.isInteger(age) && age >= 0);
  }

  createUser(input: CreateUser): Promise<User> {
    if (!this.isValidAge(input.age)) {
      return Promise.reject(UserErrors.invalidData({ constraint: 'users_age_check' }));
    }

    if (this.findByEmail(input.email)) {
      return Promise.reject(UserErrors.emailTaken({ constraint: 'users_email_key' }));
    }

    const now = this.now();
    const user: User = {
      id: randomUUID(),
      name: input.name,
      email: input.email,
      age: input.age,
      createdAt: now,
      updatedAt: now,
    };

    this.users.set(user.id, user);
    return Promise.resolve({ ...user });
  }

  getUser(id: UserId): Promise<User> {
    const user = this.users.get(InMemUserRepo.key(id));
    if (!user) return Promise.reject(UserErrors.notFound({ userId: id }));

    return Promise.resolve({ ...user });
  }

  updateUser(input: UpdateUser): Promise<User> {
    const existing = this.users.get(InMemUserRepo.key(input.id));
    if (!existing) return Promise.reject(UserErrors.notFound({ userId: input.id }));

    if (input.age !== undefined && !this.isValidAge(input.age)) {
      return Promise.reject(
        UserErrors.invalidData({ userId: input.id, constraint: 'users_age_check' }),
      );
    }

    if (input.email !== undefined) {
      const owner = this.findByEmail(input.email);
      if (owner && owner.id !== existing.id) {
        return Promise.reject(
          UserErrors.emailTaken({ userId: input.id, constraint: 'users_email_key' }),
        );
      }
    }

    const updated: User = {
      ...existing,
      name: input.name ?? existing.name,
      email: input.email ?? existing.email,
      age: input.age !== undefined ? input.age : existing.age,
      updatedAt: this.now(),
    };

    this.users.set(updated.id, updated);
    return Promise.resolve({ ...updated });
  }

  deleteUser(id: UserId): Promise<void> {
    if (!this.users.delete(InMemUserRepo.key(id))) {
      return Promise.reject(UserErrors.notFound({ userId: id }));
    }

    return Promise.resolve();
  }
}
