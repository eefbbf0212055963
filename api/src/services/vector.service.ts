/**
 * Vector Service
 *
 * Nearest-neighbour search over the pre-populated documentation collection
 * in Qdrant, through its REST API.
 *
 * Point payloads are expected to carry:
 * - text: chunk body
 * - title: page title
 * - source_url: public URL of the page
 * - doc_path: path of the page inside the docs mirror
 * - header_path: heading trail down to the chunk
 */

import { z } from 'zod';
import type { QdrantConfig } from '@/config/env';
import type { RetrievedChunk, VectorStore } from '@/services/assistant/types';
import { postJson, readJson, type FetchLike } from '@/services/upstream';

const searchResponseSchema = z.object({
  result: z.array(
    z.object({
      id: z.union([z.string(), z.number()]),
      score: z.number(),
      payload: z.record(z.string(), z.unknown()).nullish(),
    }),
  ),
});

type Payload = Record<string, unknown>;

function stringField(payload: Payload, key: string): string | undefined {
  const value = payload[key];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed || undefined;
}

function stringListField(payload: Payload, key: string): string[] {
  const value = payload[key];
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function toRetrievedChunk(hit: { score: number; payload?: Payload | null }): RetrievedChunk {
  const payload = hit.payload ?? {};
  return {
    text: stringField(payload, 'text') ?? '',
    score: hit.score,
    title: stringField(payload, 'title'),
    sourceUrl: stringField(payload, 'source_url'),
    docPath: stringField(payload, 'doc_path'),
    headerPath: stringListField(payload, 'header_path'),
  };
}

export function createQdrantStore(config: QdrantConfig, fetchImpl: FetchLike = fetch): VectorStore {
  const base = config.url.replace(/\/+$/, '');
  const url = `${base}/collections/${encodeURIComponent(config.collection)}/points/search`;
  const headers: Record<string, string> = config.apiKey ? { 'api-key': config.apiKey } : {};

  return {
    async search(vector: number[], limit: number): Promise<RetrievedChunk[]> {
      const response = await postJson({
        service: 'vector_store',
        url,
        headers,
        body: {
          vector,
          limit,
          with_payload: true,
        },
        fetchImpl,
      });

      const { result } = await readJson('vector_store', response, searchResponseSchema);
      return result.map(toRetrievedChunk);
    },
  };
}
