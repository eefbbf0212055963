import type { z } from 'zod';
import { UpstreamServiceError, type UpstreamService } from '@/errors/upstream';

export type FetchLike = typeof globalThis.fetch;

const MAX_ERROR_DETAIL_CHARS = 300;

/** Terminal payload of an OpenAI-compatible event stream. */
export const SSE_DONE = '[DONE]';

/**
 * Join an OpenAI-compatible base URL with an API path.
 * Accepts base URLs with or without a trailing `/v1`.
 */
export function openAiUrl(baseUrl: string, path: string): string {
  const base = baseUrl.replace(/\/+$/, '').replace(/\/v1$/, '');
  return `${base}/v1${path}`;
}

export async function postJson(params: {
  service: UpstreamService;
  url: string;
  body: Record<string, unknown>;
  headers?: Record<string, string>;
  fetchImpl: FetchLike;
}): Promise<Response> {
  const { service, url, body, fetchImpl } = params;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        accept: 'application/json',
        ...params.headers,
      },
      body: JSON.stringify(body),
    });
  } catch (error) {
    throw new UpstreamServiceError(service, `request failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    const detail = await response
      .text()
      .catch((error: unknown) => `unreadable body (${errorMessage(error)})`);
    const suffix = detail ? `: ${detail.slice(0, MAX_ERROR_DETAIL_CHARS)}` : '';
    throw new UpstreamServiceError(service, `HTTP ${response.status}${suffix}`, {
      status: response.status,
    });
  }

  return response;
}

export async function readJson<T>(
  service: UpstreamService,
  response: Response,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new UpstreamServiceError(service, 'response body is not JSON', {
      status: response.status,
      cause: error,
    });
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new UpstreamServiceError(service, 'unexpected response shape', {
      status: response.status,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Yield the `data:` payloads of a Server-Sent Events body. `[DONE]` is yielded
 * as the last payload when the server sends it; nothing after it is read.
 */
export async function* readSseData(stream: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });

      const lines = buffer.split('\n');
      buffer = lines.pop() || '';

      for (const rawLine of lines) {
        const payload = dataPayload(rawLine);
        if (payload === null) continue;
        yield payload;
        if (payload === SSE_DONE) return;
      }
    }

    buffer += decoder.decode();
    const payload = dataPayload(buffer);
    if (payload !== null) {
      yield payload;
    }
  } finally {
    reader.releaseLock();
  }
}

function dataPayload(rawLine: string): string | null {
  const line = rawLine.trim();
  if (!line.startsWith('data:')) return null;
  const payload = line.slice(5).trim();
  return payload || null;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
