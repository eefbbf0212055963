/**
 * Assistant Routes
 *
 * Documentation questions answered from retrieved chunks
 */

import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import type { AssistantService } from '@/services/assistant/assistant.service';
import { assistantRequestSchema } from '@/validators/assistant';
import { validationHook } from '@/middleware/validation';
import { ASSISTANT_UNAVAILABLE_MESSAGE } from '@/middleware/errorHandler';
import { logger } from '@/utils/logger';

export function createAssistantRoutes(service: AssistantService) {
  const assistant = new Hono<HonoEnv>();

  /**
   * POST /api/assistant
   *
   * Single JSON answer with its sources
   */
  assistant.post(
    '/assistant',
    zValidator('json', assistantRequestSchema, validationHook),
    async (c) => {
      const body = c.req.valid('json');
      const startedAt = Date.now();

      const result = await service.ask(body);

      logger.info('Assistant answered', {
        requestId: c.get('requestId'),
        queryLength: body.query.length,
        historyTurns: body.history.length,
        sources: result.sources.length,
        durationMs: Date.now() - startedAt,
      });

      return c.json(result);
    }
  );

  /**
   * POST /api/assistant/stream
   *
   * Server-Sent Events: `delta` events while the model writes, then one `final` event.
   * Retrieval runs before the stream opens so its failures still get a JSON error.
   */
  assistant.post(
    '/assistant/stream',
    zValidator('json', assistantRequestSchema, validationHook),
    async (c) => {
      const body = c.req.valid('json');
      const requestId = c.get('requestId');
      const startedAt = Date.now();

      const prepared = await service.prepare(body);

      return streamSSE(c, async (stream) => {
        try {
          for await (const event of service.streamAnswer(prepared, { followups: body.followups })) {
            if (event.type === 'delta') {
              await stream.writeSSE({ event: 'delta', data: JSON.stringify({ delta: event.delta }) });
            } else {
              await stream.writeSSE({ event: 'final', data: JSON.stringify(event.answer) });
            }
          }

          logger.info('Assistant stream finished', {
            requestId,
            sources: prepared.sources.length,
            durationMs: Date.now() - startedAt,
          });
        } catch (error) {
          logger.error('Assistant stream failed', {
            requestId,
            error: String(error),
          });
          await stream.writeSSE({
            event: 'error',
            data: JSON.stringify({
              code: 'ASSISTANT_UNAVAILABLE',
              message: ASSISTANT_UNAVAILABLE_MESSAGE,
            }),
          });
        }
      });
    }
  );

  return assistant;
}
