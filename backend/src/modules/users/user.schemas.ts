/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents malformed payloads from reaching the service.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Unknown keys are rejected (`.strict()`), so typos surface as 400s.
 * - Email uniqueness is the store's job, not ours.
 * - `age` is optional on create and can be cleared with `null` on update.
 */

import { z } from 'zod';

const nameSchema = z.string().trim().min(1, 'Name is required').max(200);
const emailSchema = z.string().trim().email('Invalid email address').max(320);
const ageSchema = z
  .number({ invalid_type_error: 'Age must be a number' })
  .int('Age must be an integer')
  .min(0, 'Age must not be negative')
  .max(150, 'Age must be at most 150');

export const userIdParamsSchema = z.object({
  id: z.string().min(1, 'User id is required'),
});

export const createUserSchema = z
  .object({
    name: nameSchema,
    email: emailSchema,
    age: ageSchema.nullable().default(null),
  })
  .strict();

export const updateUserSchema = z
  .object({
    name: nameSchema.optional(),
    email: emailSchema.optional(),
    age: ageSchema.nullable().optional(),
  })
  .strict()
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });
