/**
 * backend/src/modules/users/index.ts
 *
 * Public surface of the users module. Other code imports from here, not from
 * /dal or /ports directly.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { PostgresUserRepo } from './dal/user.repo';
export { InMemUserRepo } from './dal/inmem-user.repo';
export type { UserRepositoryPort } from './ports/user.repository.port';
export { UserDomainError, UserErrors } from './user.errors';
export type { UserDomainErrorKind } from './user.errors';
export type { CreateUser, UpdateUser, User, UserId } from './user.types';
