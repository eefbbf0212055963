/**
 * Chat Service
 *
 * Chat completions through an OpenAI-compatible `/v1/chat/completions`
 * endpoint, either as one JSON response or as an SSE stream of deltas.
 */

import { z } from 'zod';
import type { OpenAiConfig } from '@/config/env';
import { UpstreamServiceError } from '@/errors/upstream';
import type { ChatClient, ChatCompletionOptions, ChatMessage } from '@/services/assistant/types';
import {
  SSE_DONE,
  openAiUrl,
  postJson,
  readJson,
  readSseData,
  type FetchLike,
} from '@/services/upstream';
import { logger } from '@/utils/logger';

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      }),
    )
    .min(1),
});

const streamChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z
        .object({
          content: z.string().nullish(),
        })
        .nullish(),
    }),
  ),
});

const streamErrorSchema = z.object({
  error: z.union([
    z.string(),
    z.object({ message: z.string().nullish() }).passthrough(),
  ]),
});

function streamErrorMessage(error: z.infer<typeof streamErrorSchema>['error']): string {
  if (typeof error === 'string') return error;
  return error.message || 'unknown error';
}

export function createOpenAiChat(config: OpenAiConfig, fetchImpl: FetchLike = fetch): ChatClient {
  const url = openAiUrl(config.baseUrl, '/chat/completions');
  const headers = { authorization: `Bearer ${config.apiKey}` };

  function requestBody(messages: ChatMessage[], options: ChatCompletionOptions, stream: boolean) {
    return {
      model: config.chatModel,
      temperature: options.temperature,
      messages,
      ...(stream ? { stream: true } : {}),
      ...(options.responseFormat ? { response_format: { type: options.responseFormat } } : {}),
    };
  }

  return {
    async complete(messages, options) {
      const response = await postJson({
        service: 'chat',
        url,
        headers,
        body: requestBody(messages, options, false),
        fetchImpl,
      });

      const { choices } = await readJson('chat', response, completionSchema);
      return choices[0].message.content ?? '';
    },

    async *stream(messages, options) {
      const response = await postJson({
        service: 'chat',
        url,
        headers: { ...headers, accept: 'text/event-stream' },
        body: requestBody(messages, options, true),
        fetchImpl,
      });

      if (!response.body) {
        throw new UpstreamServiceError('chat', 'stream response has no body', {
          status: response.status,
        });
      }

      for await (const payload of readSseData(response.body)) {
        if (payload === SSE_DONE) return;

        let event: unknown;
        try {
          event = JSON.parse(payload);
        } catch (error) {
          logger.debug('Skipping non-JSON chat stream event', { error: String(error) });
          continue;
        }

        const failure = streamErrorSchema.safeParse(event);
        if (failure.success) {
          throw new UpstreamServiceError(
            'chat',
            `stream error: ${streamErrorMessage(failure.data.error)}`,
            { status: response.status },
          );
        }

        const parsed = streamChunkSchema.safeParse(event);
        if (!parsed.success) continue;

        const delta = parsed.data.choices[0]?.delta?.content;
        if (delta) yield delta;
      }

      throw new UpstreamServiceError('chat', `stream ended before ${SSE_DONE}`, {
        status: response.status,
      });
    },
  };
}
