/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive thrown by controllers and mapped by the error handler.
 * - Keeps API error responses consistent.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic errors (e.g. users/user.errors.ts).
 */

export const APP_ERROR_CODES = ['NOT_FOUND', 'VALIDATION_ERROR', 'CONFLICT', 'INTERNAL'] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    meta?: AppErrorMeta;
    cause?: unknown;
  }) {
    super(opts.message, { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, meta });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', status: 409, message, meta });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta, cause?: unknown) {
    return new AppError({ code: 'INTERNAL', status: 500, message, meta, cause });
  }
}
