/**
 * backend/src/shared/db/schema.ts
 *
 * Kysely table interfaces. Keep in step with ./migrations.
 */

import type { ColumnType, Generated } from 'kysely';

// Read as Date; optional on insert because the column defaults to now().
export type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export interface UsersTable {
  id: Generated<string>;
  name: string;
  email: string;
  age: number | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface DB {
  users: UsersTable;
}
