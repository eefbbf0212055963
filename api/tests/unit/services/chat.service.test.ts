import { describe, it, expect, vi } from 'vitest';
import type { OpenAiConfig } from '@/config/env';
import { createOpenAiChat } from '@/services/chat.service';
import { createFetchMock, jsonResponse, requestJson, sseResponse } from '../../fixtures/fetch';

vi.mock('@/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const OPENAI: OpenAiConfig = {
  apiKey: 'test-key',
  baseUrl: 'https://api.openai.test/v1',
  chatModel: 'gpt-4o-mini',
  embeddingModel: 'text-embedding-3-large',
};

const MESSAGES = [
  { role: 'system' as const, content: 'Be brief.' },
  { role: 'user' as const, content: 'Hi' },
];

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const item of stream) out.push(item);
  return out;
}

describe('chat.service', () => {
  describe('complete()', () => {
    it('posts model, temperature and messages and returns the message content', async () => {
      const { fetchMock, requests } = createFetchMock(() =>
        jsonResponse({ choices: [{ message: { role: 'assistant', content: 'Hello.' } }] }),
      );

      const content = await createOpenAiChat(OPENAI, fetchMock).complete(MESSAGES, { temperature: 0.2 });

      expect(content).toBe('Hello.');
      expect(requests[0].url).toBe('https://api.openai.test/v1/chat/completions');
      expect(requestJson(requests[0])).toEqual({
        model: 'gpt-4o-mini',
        temperature: 0.2,
        messages: MESSAGES,
      });
    });

    it('asks for a JSON object when requested', async () => {
      const { fetchMock, requests } = createFetchMock(() =>
        jsonResponse({ choices: [{ message: { content: '{"followups":[]}' } }] }),
      );

      await createOpenAiChat(OPENAI, fetchMock).complete(MESSAGES, {
        temperature: 0.4,
        responseFormat: 'json_object',
      });

      expect(requestJson(requests[0]).response_format).toEqual({ type: 'json_object' });
    });

    it('returns an empty string for a null content', async () => {
      const { fetchMock } = createFetchMock(() =>
        jsonResponse({ choices: [{ message: { content: null } }] }),
      );

      await expect(createOpenAiChat(OPENAI, fetchMock).complete(MESSAGES, { temperature: 0 })).resolves.toBe('');
    });

    it('fails with a chat error when there are no choices', async () => {
      const { fetchMock } = createFetchMock(() => jsonResponse({ choices: [] }));

      await expect(
        createOpenAiChat(OPENAI, fetchMock).complete(MESSAGES, { temperature: 0 }),
      ).rejects.toMatchObject({ service: 'chat', message: 'chat: unexpected response shape' });
    });
  });

  describe('stream()', () => {
    it('requests a stream and yields the content deltas', async () => {
      const { fetchMock, requests } = createFetchMock(() =>
        sseResponse([
          'data: {"choices":[{"delta":{"role":"assistant"}}]}\n\n',
          'data: {"choices":[{"delta":{"content":"Hel"}}]}\n\ndata: {"choi',
          'ces":[{"delta":{"content":"lo."}}]}\n\n',
          'data: not-json\n\n',
          'data: [DONE]\n\n',
        ]),
      );

      const deltas = await collect(createOpenAiChat(OPENAI, fetchMock).stream(MESSAGES, { temperature: 0.2 }));

      expect(deltas).toEqual(['Hel', 'lo.']);
      expect(requestJson(requests[0]).stream).toBe(true);
      expect(new Headers(requests[0].init?.headers).get('accept')).toBe('text/event-stream');
    });

    it('fails with a chat error when the provider reports an error mid-stream', async () => {
      const { fetchMock } = createFetchMock(() =>
        sseResponse([
          'data: {"choices":[{"delta":{"content":"Partial"}}]}\n\n',
          'data: {"error":{"message":"model overloaded","type":"server_error"}}\n\n',
        ]),
      );

      const deltas: string[] = [];
      const consume = async () => {
        for await (const delta of createOpenAiChat(OPENAI, fetchMock).stream(MESSAGES, { temperature: 0.2 })) {
          deltas.push(delta);
        }
      };

      await expect(consume()).rejects.toMatchObject({
        service: 'chat',
        message: 'chat: stream error: model overloaded',
      });
      expect(deltas).toEqual(['Partial']);
    });

    it('fails with a chat error when the body ends before [DONE]', async () => {
      const { fetchMock } = createFetchMock(() =>
        sseResponse(['data: {"choices":[{"delta":{"content":"Cut"}}]}\n\n']),
      );

      await expect(
        collect(createOpenAiChat(OPENAI, fetchMock).stream(MESSAGES, { temperature: 0.2 })),
      ).rejects.toMatchObject({ service: 'chat', message: 'chat: stream ended before [DONE]' });
    });

    it('fails before yielding when the upstream rejects the request', async () => {
      const { fetchMock } = createFetchMock(() => jsonResponse({ error: 'overloaded' }, 503));

      await expect(
        collect(createOpenAiChat(OPENAI, fetchMock).stream(MESSAGES, { temperature: 0.2 })),
      ).rejects.toMatchObject({ service: 'chat', status: 503 });
    });
  });
});
