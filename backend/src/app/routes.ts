/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes (users)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      storage: opts.config.storage.driver,
      requestId: req.requestContext.requestId,
    };
  });

  // Module routes
  opts.deps.users.registerRoutes(app);
}
