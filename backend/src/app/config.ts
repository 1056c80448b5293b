/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv and storage.driver are unions, not plain strings, so the composition
 *   root can branch on them exhaustively. Invalid values ('prod', 'mysql') fail at
 *   startup in Zod rather than falling through to the wrong branch.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');
const StorageDriverSchema = z.enum(['postgres', 'memory']).default('postgres');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    STORAGE_DRIVER: StorageDriverSchema,
    DATABASE_URL: z.string().min(1).optional(),
    DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(5),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('user-service'),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORAGE_DRIVER=postgres',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type StorageConfig =
  | { driver: 'postgres'; databaseUrl: string; poolMax: number }
  | { driver: 'memory' };

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  storage: StorageConfig;

  logLevel: string;
  serviceName: string;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  const storage: StorageConfig =
    parsed.STORAGE_DRIVER === 'postgres' && parsed.DATABASE_URL
      ? { driver: 'postgres', databaseUrl: parsed.DATABASE_URL, poolMax: parsed.DB_POOL_MAX }
      : { driver: 'memory' };

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    storage,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
  };
}
