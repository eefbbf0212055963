/**
 * Assistant Service
 *
 * embed query → top-K search → citations + prompt → chat completion.
 * Upstream failures propagate as UpstreamServiceError; nothing is retried.
 */

import type { RagConfig } from '@/config/env';
import { InvalidRequestError } from '@/errors/request';
import { UpstreamServiceError } from '@/errors/upstream';
import { logger } from '@/utils/logger';
import {
  buildContext,
  buildFollowupPrompt,
  buildMessages,
  parseFollowups,
  sourceReference,
  toCitations,
} from './prompt';
import type {
  AssistantAnswer,
  AssistantQuery,
  AssistantStreamEvent,
  ChatClient,
  EmbeddingClient,
  PreparedPrompt,
  VectorStore,
} from './types';

export const ANSWER_TEMPERATURE = 0.2;
export const FOLLOWUP_TEMPERATURE = 0.4;

export interface AssistantServiceDeps {
  embedder: EmbeddingClient;
  store: VectorStore;
  chat: ChatClient;
  rag: RagConfig;
}

export interface AssistantService {
  /** Retrieve context and build the chat messages, without calling the chat model. */
  prepare(input: AssistantQuery): Promise<PreparedPrompt>;
  ask(input: AssistantQuery): Promise<AssistantAnswer>;
  streamAnswer(
    prepared: PreparedPrompt,
    options?: { followups?: boolean },
  ): AsyncGenerator<AssistantStreamEvent>;
}

export function createAssistantService(deps: AssistantServiceDeps): AssistantService {
  const { embedder, store, chat, rag } = deps;

  async function prepare(input: AssistantQuery): Promise<PreparedPrompt> {
    const query = input.query.trim();
    if (!query) {
      throw new InvalidRequestError('query must not be empty');
    }

    const topK = input.topK ?? rag.topK;
    const vector = await embedder.embed(query);
    const chunks = await store.search(vector, topK);
    const citations = toCitations(chunks, rag).slice(0, topK);

    logger.debug('Retrieved documentation chunks', {
      topK,
      hits: chunks.length,
      bestScore: citations[0]?.score ?? null,
    });

    return {
      query,
      messages: buildMessages(rag, query, input.history ?? [], buildContext(citations)),
      citations,
      sources: citations.map(sourceReference),
    };
  }

  async function suggestFollowups(prepared: PreparedPrompt, answer: string): Promise<string[]> {
    try {
      const content = await chat.complete(
        [{ role: 'user', content: buildFollowupPrompt(prepared.query, answer, prepared.citations) }],
        { temperature: FOLLOWUP_TEMPERATURE, responseFormat: 'json_object' },
      );
      return parseFollowups(content);
    } catch (error) {
      // Follow-ups never fail an answer that is already complete
      logger.warn('Follow-up generation failed', { error: String(error) });
      return [];
    }
  }

  async function finish(
    prepared: PreparedPrompt,
    rawAnswer: string,
    followups: boolean | undefined,
  ): Promise<AssistantAnswer> {
    const answer = rawAnswer.trim();
    if (!answer) {
      throw new UpstreamServiceError('chat', 'completion returned no content');
    }

    const result: AssistantAnswer = {
      answer,
      sources: prepared.sources,
      citations: prepared.citations,
    };
    if (followups) {
      result.followups = await suggestFollowups(prepared, answer);
    }
    return result;
  }

  return {
    prepare,

    async ask(input) {
      const prepared = await prepare(input);
      const content = await chat.complete(prepared.messages, { temperature: ANSWER_TEMPERATURE });
      return finish(prepared, content, input.followups);
    },

    async *streamAnswer(prepared, options = {}) {
      let content = '';
      for await (const delta of chat.stream(prepared.messages, { temperature: ANSWER_TEMPERATURE })) {
        content += delta;
        yield { type: 'delta', delta };
      }
      yield { type: 'final', answer: await finish(prepared, content, options.followups) };
    },
  };
}
