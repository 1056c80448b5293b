import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { BODY_LIMIT_BYTES } from '../../src/app/server';
import { createScriptedDb, pgError } from '../helpers/scripted-db';
import { PostgresUserRepo } from '../../src/modules/users/dal/user.repo';
import { UserErrors } from '../../src/modules/users/user.errors';
import type { UserRepositoryPort } from '../../src/modules/users/ports/user.repository.port';

/**
 * WHY:
 * - Every failure path answers with `{ error: { code, message } }` and the right status.
 * - Malformed input is always a 4xx, never a 500.
 */

const USER_ID = '6f1c2a4e-0b7d-4c59-9a39-1d2f7e8b9c01';

function failingRepo(): UserRepositoryPort {
  const fail = () => Promise.reject(UserErrors.storeFailure('reach', new Error('ECONNREFUSED')));
  return {
    createUser: fail,
    getUser: fail,
    updateUser: fail,
    deleteUser: fail,
  };
}

describe('users error mapping', () => {
  it('malformed JSON is a 400 validation error', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/users',
        headers: { 'content-type': 'application/json' },
        payload: '{"name": "Alice", "email":',
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Malformed request body' },
      });
    } finally {
      await close();
    }
  });

  it('an empty JSON body is a 400 validation error', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/users',
        headers: { 'content-type': 'application/json' },
        payload: '',
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Malformed request body' },
      });
    } finally {
      await close();
    }
  });

  it('an unsupported content type is a 415', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/users',
        headers: { 'content-type': 'application/xml' },
        payload: '<user/>',
      });

      expect(res.statusCode).toBe(415);
      expect(res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Unsupported media type' },
      });
    } finally {
      await close();
    }
  });

  it('a body over the size limit is a 413', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/users',
        headers: { 'content-type': 'application/json' },
        payload: JSON.stringify({ name: 'x'.repeat(BODY_LIMIT_BYTES), email: 'a@x.com' }),
      });

      expect(res.statusCode).toBe(413);
      expect(res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Request body too large' },
      });
    } finally {
      await close();
    }
  });

  it.each([
    ['missing email', { name: 'Alice' }],
    ['invalid email', { name: 'Alice', email: 'not-an-email' }],
    ['blank name', { name: '   ', email: 'a@x.com' }],
    ['fractional age', { name: 'Alice', email: 'a@x.com', age: 1.5 }],
    ['negative age', { name: 'Alice', email: 'a@x.com', age: -1 }],
    ['string age', { name: 'Alice', email: 'a@x.com', age: 'thirty' }],
    ['unknown key', { name: 'Alice', email: 'a@x.com', id: USER_ID }],
  ])('create with %s is a 400', async (_label, payload) => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'POST', url: '/users', payload });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' },
      });
    } finally {
      await close();
    }
  });

  it('an empty update is a 400', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'PUT', url: `/users/${USER_ID}`, payload: {} });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' },
      });
    } finally {
      await close();
    }
  });

  it('a duplicate email is a 409 on create and on update', async () => {
    const { app, close } = await buildTestApp();

    try {
      const first = await app.inject({
        method: 'POST',
        url: '/users',
        payload: { name: 'Alice', email: 'a@x.com' },
      });
      expect(first.statusCode).toBe(201);

      const duplicate = await app.inject({
        method: 'POST',
        url: '/users',
        payload: { name: 'Other Alice', email: 'a@x.com' },
      });
      expect(duplicate.statusCode).toBe(409);
      expect(duplicate.json()).toEqual({
        error: { code: 'CONFLICT', message: 'User with this email already exists' },
      });

      const bob = await app.inject({
        method: 'POST',
        url: '/users',
        payload: { name: 'Bob', email: 'b@x.com' },
      });
      const bobId = bob.json<{ data: { id: string } }>().data.id;

      const clash = await app.inject({
        method: 'PUT',
        url: `/users/${bobId}`,
        payload: { email: 'a@x.com' },
      });
      expect(clash.statusCode).toBe(409);
    } finally {
      await close();
    }
  });

  it('a store failure is a generic 500', async () => {
    const { app, close } = await buildTestApp({}, { repositories: { userRepo: failingRepo() } });

    try {
      const res = await app.inject({ method: 'GET', url: `/users/${USER_ID}` });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({
        error: { code: 'INTERNAL', message: 'Internal server error' },
      });
    } finally {
      await close();
    }
  });

  it('maps Postgres unique violations through the real adapter to 409', async () => {
    const { db, connection } = createScriptedDb();
    connection.fail(pgError('23505', 'users_email_key'));

    const { app, close } = await buildTestApp(
      {},
      { repositories: { userRepo: new PostgresUserRepo(db) } },
    );

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/users',
        payload: { name: 'Alice', email: 'a@x.com', age: 30 },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({
        error: { code: 'CONFLICT', message: 'User with this email already exists' },
      });
      expect(connection.queries).toHaveLength(1);
    } finally {
      await close();
    }
  });
});
