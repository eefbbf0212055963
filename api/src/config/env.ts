/**
 * Environment Configuration
 *
 * Parsed once at startup. Required variables fail fast with a ConfigError
 * naming every problem; optional ones fall back to the defaults below.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '@/errors/config';

export const DEFAULT_SYSTEM_PROMPT = [
  'You are the built-in assistant of this documentation portal.',
  'Answer only from the provided context.',
  'If the context is not enough, say so plainly and suggest what the user could clarify.',
  'Keep answers short and to the point.',
  'Back factual statements with source references in the form [S1], [S2].',
].join(' ');

export const DEFAULT_ANSWER_INSTRUCTION = 'Answer in the language of the question.';

export interface OpenAiConfig {
  apiKey: string;
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

export interface QdrantConfig {
  url: string;
  apiKey?: string;
  collection: string;
}

export interface RagConfig {
  topK: number;
  snippetChars: number;
  historyTurns: number;
  defaultTitle: string;
  systemPrompt: string;
  answerInstruction: string;
}

export interface ServerConfig {
  host: string;
  port: number;
  staticRoot: string;
  corsOrigins: string[];
}

export interface AppConfig {
  openai: OpenAiConfig;
  qdrant: QdrantConfig;
  rag: RagConfig;
  server: ServerConfig;
}

// Treat `FOO=` the same as an unset variable
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const required = () => z.preprocess(blankToUndefined, z.string().trim());
const optional = () => z.preprocess(blankToUndefined, z.string().trim().optional());
const withDefault = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(fallback));
const intWithDefault = (fallback: number, min: number, max: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const envSchema = z.object({
  OPENAI_API_KEY: required(),
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default('https://api.openai.com')),
  OPENAI_CHAT_MODEL: withDefault('gpt-4o-mini'),
  EMBED_MODEL: withDefault('text-embedding-3-large'),

  QDRANT_URL: z.preprocess(blankToUndefined, z.string().url()),
  QDRANT_API_KEY: optional(),
  QDRANT_COLLECTION: required(),

  RAG_TOP_K: intWithDefault(6, 1, 50),
  RAG_SNIPPET_CHARS: intWithDefault(700, 1, 20_000),
  RAG_HISTORY_TURNS: intWithDefault(8, 0, 50),

  ASSISTANT_DEFAULT_TITLE: withDefault('Documentation'),
  ASSISTANT_SYSTEM_PROMPT: withDefault(DEFAULT_SYSTEM_PROMPT),
  ASSISTANT_ANSWER_INSTRUCTION: withDefault(DEFAULT_ANSWER_INSTRUCTION),

  STATIC_ROOT: withDefault('public'),
  CORS_ORIGIN: optional(),
  HOST: withDefault('0.0.0.0'),
  PORT: intWithDefault(8000, 1, 65_535),
});

function splitOrigins(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Load `.env` (or `.env.txt` when there is no `.env`) from `dir`.
 * Variables already present in the process environment win.
 */
export function loadEnvFiles(dir: string = process.cwd()): string | null {
  for (const name of ['.env', '.env.txt']) {
    const file = resolve(dir, name);
    if (existsSync(file)) {
      loadDotenv({ path: file });
      return file;
    }
  }
  return null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL,
      chatModel: e.OPENAI_CHAT_MODEL,
      embeddingModel: e.EMBED_MODEL,
    },
    qdrant: {
      url: e.QDRANT_URL,
      apiKey: e.QDRANT_API_KEY,
      collection: e.QDRANT_COLLECTION,
    },
    rag: {
      topK: e.RAG_TOP_K,
      snippetChars: e.RAG_SNIPPET_CHARS,
      historyTurns: e.RAG_HISTORY_TURNS,
      defaultTitle: e.ASSISTANT_DEFAULT_TITLE,
      systemPrompt: e.ASSISTANT_SYSTEM_PROMPT,
      answerInstruction: e.ASSISTANT_ANSWER_INSTRUCTION,
    },
    server: {
      host: e.HOST,
      port: e.PORT,
      staticRoot: e.STATIC_ROOT,
      corsOrigins: splitOrigins(e.CORS_ORIGIN),
    },
  };
}
