/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts; module routes are added by app/routes.ts.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { withRequestContext } from '../shared/logger/with-context';

export const BODY_LIMIT_BYTES = 64 * 1024;

export async function buildServer(opts: { config: AppConfig }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: BODY_LIMIT_BYTES,
  });

  registerRequestContext(app);
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request', { flow: 'http.request' });
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    withRequestContext(req).info('response', {
      flow: 'http.response',
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
      env: opts.config.nodeEnv,
    });
    done();
  });

  return app;
}
