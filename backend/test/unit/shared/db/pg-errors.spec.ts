import { describe, it, expect } from 'vitest';
import {
  PG_ERROR_CODES,
  classifyPgError,
  getPgConstraint,
  getPgErrorCode,
} from '../../../../src/shared/db/pg-errors';
import { pgError } from '../../../helpers/scripted-db';

describe('getPgErrorCode', () => {
  it('reads the SQLSTATE from a pg error', () => {
    expect(getPgErrorCode(pgError('23505'))).toBe('23505');
    expect(getPgErrorCode(pgError('22P02'))).toBe('22P02');
  });

  it('ignores node errno codes and non-objects', () => {
    expect(getPgErrorCode(Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }))).toBe(
      undefined,
    );
    expect(getPgErrorCode(new Error('plain'))).toBeUndefined();
    expect(getPgErrorCode(null)).toBeUndefined();
    expect(getPgErrorCode('23505')).toBeUndefined();
    expect(getPgErrorCode({ code: 23505 })).toBeUndefined();
  });
});

describe('getPgConstraint', () => {
  it('returns the constraint name when present', () => {
    expect(getPgConstraint(pgError('23505', 'users_email_key'))).toBe('users_email_key');
    expect(getPgConstraint(pgError('23505'))).toBeUndefined();
    expect(getPgConstraint(undefined)).toBeUndefined();
  });
});

describe('classifyPgError', () => {
  it('classifies unique violations', () => {
    expect(classifyPgError(pgError(PG_ERROR_CODES.uniqueViolation))).toBe('unique_violation');
  });

  it('classifies constraint and data errors as invalid data', () => {
    for (const code of ['23502', '23514', '22001', '22003', '22P02']) {
      expect(classifyPgError(pgError(code))).toBe('invalid_data');
    }
  });

  it('classifies everything else as other', () => {
    expect(classifyPgError(pgError('40001'))).toBe('other');
    expect(classifyPgError(pgError('57P01'))).toBe('other');
    expect(classifyPgError(new Error('Connection terminated unexpectedly'))).toBe('other');
  });
});
