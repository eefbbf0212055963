/**
 * In-process stand-ins for the embedding service, vector store and chat model.
 */

import { vi } from 'vitest';
import type { RagConfig } from '@/config/env';
import type {
  ChatClient,
  ChatCompletionOptions,
  ChatMessage,
  EmbeddingClient,
  RetrievedChunk,
  VectorStore,
} from '@/services/assistant/types';

export const TEST_RAG_CONFIG: RagConfig = {
  topK: 6,
  snippetChars: 700,
  historyTurns: 8,
  defaultTitle: 'Documentation',
  systemPrompt: 'Answer from the context only.',
  answerInstruction: 'Answer in the language of the question.',
};

export function makeChunk(overrides: Partial<RetrievedChunk> = {}): RetrievedChunk {
  return {
    text: 'Install the driver package before plugging in the token.',
    score: 0.9,
    title: 'Installation',
    sourceUrl: 'https://docs.example.test/install',
    docPath: 'guides/install.md',
    headerPath: ['Guides', 'Installation'],
    ...overrides,
  };
}

export function createFakeEmbedder(vector: number[] = [0.1, 0.2, 0.3]) {
  const embed = vi.fn(async (_text: string) => vector);
  const embedder: EmbeddingClient = { embed };
  return { embedder, embed };
}

export function createFakeStore(chunks: RetrievedChunk[] = [makeChunk()]) {
  const search = vi.fn(async (_vector: number[], _limit: number) => chunks);
  const store: VectorStore = { search };
  return { store, search };
}

export function createFakeChat(options: { answer?: string; deltas?: string[]; followups?: string } = {}) {
  const answer = options.answer ?? 'Install the driver first [S1].';
  const deltas = options.deltas ?? ['Install ', 'the driver ', 'first [S1].'];

  const complete = vi.fn(async (_messages: ChatMessage[], completion: ChatCompletionOptions) => {
    if (completion.responseFormat === 'json_object') {
      return options.followups ?? '{"followups":["Which versions are supported?"]}';
    }
    return answer;
  });
  const stream = vi.fn(async function* (_messages: ChatMessage[], _completion: ChatCompletionOptions) {
    for (const delta of deltas) {
      yield delta;
    }
  });

  const chat: ChatClient = { complete, stream };
  return { chat, complete, stream };
}
