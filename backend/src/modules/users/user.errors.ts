/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its failure taxonomy (UserDomainError).
 * - Adapters produce it, the service forwards it, the controller maps it to HTTP.
 *
 * RULES:
 * - Domain errors know nothing about HTTP; `toAppError` is the only bridge.
 * - Store causes are kept on `cause` for logs and never sent to clients.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export type UserDomainErrorKind = 'NOT_FOUND' | 'CONFLICT' | 'VALIDATION' | 'STORE_FAILURE';

export class UserDomainError extends Error {
  readonly kind: UserDomainErrorKind;
  readonly meta?: AppErrorMeta;

  constructor(opts: {
    kind: UserDomainErrorKind;
    message: string;
    meta?: AppErrorMeta;
    cause?: unknown;
  }) {
    super(opts.message, { cause: opts.cause });
    this.name = 'UserDomainError';
    this.kind = opts.kind;
    this.meta = opts.meta;
  }
}

export const UserErrors = {
  notFound(meta?: AppErrorMeta) {
    return new UserDomainError({ kind: 'NOT_FOUND', message: 'User not found', meta });
  },

  emailTaken(meta?: AppErrorMeta, cause?: unknown) {
    return new UserDomainError({
      kind: 'CONFLICT',
      message: 'User with this email already exists',
      meta,
      cause,
    });
  },

  invalidData(meta?: AppErrorMeta, cause?: unknown) {
    return new UserDomainError({
      kind: 'VALIDATION',
      message: 'User data violates a constraint',
      meta,
      cause,
    });
  },

  storeFailure(operation: string, cause?: unknown) {
    return new UserDomainError({
      kind: 'STORE_FAILURE',
      message: `Failed to ${operation} user`,
      meta: { operation },
      cause,
    });
  },
} as const;

export function isUserDomainError(err: unknown): err is UserDomainError {
  return err instanceof UserDomainError;
}

export function toAppError(err: UserDomainError): AppError {
  switch (err.kind) {
    case 'NOT_FOUND':
      return AppError.notFound(err.message, err.meta);
    case 'CONFLICT':
      return AppError.conflict(err.message, err.meta);
    case 'VALIDATION':
      return AppError.validationError(err.message, err.meta);
    case 'STORE_FAILURE':
      return AppError.internal('Internal server error', err.meta, err);
  }
}
