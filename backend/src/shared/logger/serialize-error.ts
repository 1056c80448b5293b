/**
 * backend/src/shared/logger/serialize-error.ts
 *
 * JSON logs drop Error instances nested in meta (`{}`), so errors are flattened
 * into plain objects before logging. Follows the `cause` chain a few levels deep.
 */

export type SerializedError = {
  name: string;
  message: string;
  code?: string;
  stack?: string;
  cause?: SerializedError | string;
};

const MAX_CAUSE_DEPTH = 5;

export function serializeError(err: unknown, depth = 0): SerializedError | string {
  if (!(err instanceof Error)) return String(err);

  const out: SerializedError = { name: err.name, message: err.message, stack: err.stack };

  if ('code' in err && typeof err.code === 'string') out.code = err.code;

  if (err.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
    out.cause = serializeError(err.cause, depth + 1);
  }

  return out;
}
