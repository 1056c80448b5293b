/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain model for the Users module: plain records, no behavior.
 * - Every layer speaks these types; only the DAL knows row shapes.
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - `id` is assigned by the store and never changes.
 */

export type UserId = string;

export type User = {
  readonly id: UserId;
  name: string;
  email: string;
  age: number | null;

  createdAt: Date;
  updatedAt: Date;
};

/** Everything needed to create a user except the identifier. */
export type CreateUser = {
  name: string;
  email: string;
  age: number | null;
};

/** Partial update. Absent fields keep their stored value. */
export type UpdateUser = {
  id: UserId;
  name?: string;
  email?: string;
  age?: number | null;
};
