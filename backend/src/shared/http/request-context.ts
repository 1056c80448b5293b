/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Every request gets a stable requestId for logs and debugging.
 * - Callers (gateways, load balancers) may already have assigned one; we keep it.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'x-request-id';

// Upstream ids are echoed back in a header, so keep them short and printable.
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export type RequestContext = {
  requestId: string;
  host: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "localhost:3000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

export function resolveRequestId(rawHeader: unknown): string {
  if (typeof rawHeader === 'string' && REQUEST_ID_PATTERN.test(rawHeader)) return rawHeader;
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  // Decorate so Fastify knows the property exists; the real value is set per request.
  app.decorateRequest('requestContext', null);

  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = resolveRequestId(req.headers[REQUEST_ID_HEADER]);

    req.requestContext = {
      requestId,
      host: parseHost(req.headers.host),
    };

    reply.header(REQUEST_ID_HEADER, requestId);

    done();
  });
}
