/**
 * Application factory
 *
 * - Health probe (/health)
 * - Assistant API (/api/*)
 * - Static documentation portal (everything else)
 */

import { Hono } from 'hono';
import { requestId } from 'hono/request-id';
import { serveStatic } from '@hono/node-server/serve-static';
import { securityHeaders } from '@/middleware/securityHeaders';
import { createCorsMiddleware } from '@/middleware/cors';
import { errorBody, handleError, type ErrorResponse } from '@/middleware/errorHandler';
import { createAssistantRoutes } from '@/routes/assistant';
import type { AssistantService } from '@/services/assistant/assistant.service';
import type { HonoEnv } from '@/types/hono';

export const APP_VERSION = '1.0.0';

export interface AppDeps {
  assistant: AssistantService;
  staticRoot: string;
  corsOrigins: string[];
}

export function createApp(deps: AppDeps) {
  const app = new Hono<HonoEnv>();

  // Global middleware chain
  app.use('*', requestId());
  app.use('*', securityHeaders);
  app.use('/api/*', createCorsMiddleware(deps.corsOrigins));

  // Liveness only: no upstream checks
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
    });
  });

  app.route('/api', createAssistantRoutes(deps.assistant));

  app.use('/*', serveStatic({ root: deps.staticRoot }));

  app.onError(handleError);

  app.notFound((c) => {
    return c.json<ErrorResponse>(errorBody('NOT_FOUND', 'Endpoint not found'), 404);
  });

  return app;
}
