/**
 * CORS Middleware
 *
 * The portal usually calls the API from its own origin. When CORS_ORIGIN
 * lists origins, only those are allowed; otherwise any origin is echoed
 * back (and no-origin callers get the wildcard). Credentials are never
 * allowed since the API has no session.
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

export function createCorsMiddleware(allowedOrigins: string[]): MiddlewareHandler {
  return cors({
    origin: (origin) => {
      if (allowedOrigins.length === 0) {
        return origin || '*';
      }
      return allowedOrigins.includes(origin) ? origin : '';
    },
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
    exposeHeaders: ['Content-Length', 'X-Request-Id'],
    maxAge: 86400, // 24 hours
  });
}
