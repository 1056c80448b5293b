/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for the Users CRUD endpoints.
 * - Validates params/body, shapes the response DTO, maps UserDomainError -> AppError.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';

import { AppError } from '../../shared/http/errors';
import { createUserSchema, updateUserSchema, userIdParamsSchema } from './user.schemas';
import { isUserDomainError, toAppError } from './user.errors';
import type { UserService } from './user.service';
import type { UpdateUser, User } from './user.types';

export type UserResponseData = {
  id: string;
  name: string;
  email: string;
  age: number | null;
  createdAt: string;
  updatedAt: string;
};

export type ApiResponseBody<T> = {
  statusCode: number;
  data: T;
};

export function toUserResponse(user: User): UserResponseData {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    age: user.age,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

function parseOrThrow<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw AppError.validationError(`Invalid request ${what}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

async function mapDomainErrors<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (isUserDomainError(err)) throw toAppError(err);
    throw err;
  }
}

export class UserController {
  constructor(private readonly userService: UserService) {}

  async createUser(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(createUserSchema, req.body, 'body');

    const user = await mapDomainErrors(() => this.userService.createUser(body));

    const response: ApiResponseBody<UserResponseData> = {
      statusCode: 201,
      data: toUserResponse(user),
    };
    return reply.status(201).send(response);
  }

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params, 'params');

    const user = await mapDomainErrors(() => this.userService.getUser(id));

    const response: ApiResponseBody<UserResponseData> = {
      statusCode: 200,
      data: toUserResponse(user),
    };
    return reply.status(200).send(response);
  }

  async updateUser(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params, 'params');
    const body = parseOrThrow(updateUserSchema, req.body, 'body');

    const input: UpdateUser = { id, ...body };
    const user = await mapDomainErrors(() => this.userService.updateUser(input));

    const response: ApiResponseBody<UserResponseData> = {
      statusCode: 200,
      data: toUserResponse(user),
    };
    return reply.status(200).send(response);
  }

  async deleteUser(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params, 'params');

    await mapDomainErrors(() => this.userService.deleteUser(id));

    return reply.status(204).send();
  }
}
