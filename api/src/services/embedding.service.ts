/**
 * Embedding Service
 *
 * Query embeddings through an OpenAI-compatible `/v1/embeddings` endpoint.
 */

import { z } from 'zod';
import type { OpenAiConfig } from '@/config/env';
import { UpstreamServiceError } from '@/errors/upstream';
import type { EmbeddingClient } from '@/services/assistant/types';
import { openAiUrl, postJson, readJson, type FetchLike } from '@/services/upstream';

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
      }),
    )
    .min(1),
});

export function createOpenAiEmbedder(
  config: OpenAiConfig,
  fetchImpl: FetchLike = fetch,
): EmbeddingClient {
  const url = openAiUrl(config.baseUrl, '/embeddings');

  return {
    async embed(text: string): Promise<number[]> {
      const response = await postJson({
        service: 'embedding',
        url,
        headers: { authorization: `Bearer ${config.apiKey}` },
        body: {
          model: config.embeddingModel,
          input: [text],
        },
        fetchImpl,
      });

      const { data } = await readJson('embedding', response, embeddingResponseSchema);
      const embedding = data[0].embedding;
      if (embedding.length === 0) {
        throw new UpstreamServiceError('embedding', 'empty embedding vector', {
          status: response.status,
        });
      }
      return embedding;
    },
  };
}
