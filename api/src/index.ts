/**
 * Docs Assistant Server
 *
 * Hono on @hono/node-server:
 * - Static documentation portal (/)
 * - Assistant API (/api/assistant, /api/assistant/stream)
 * - Health check (/health)
 */

import { serve } from '@hono/node-server';
import { createApp } from '@/app';
import { loadConfig, loadEnvFiles, type AppConfig } from '@/config/env';
import { ConfigError } from '@/errors/config';
import { createAssistantService } from '@/services/assistant/assistant.service';
import { createOpenAiChat } from '@/services/chat.service';
import { createOpenAiEmbedder } from '@/services/embedding.service';
import { createQdrantStore } from '@/services/vector.service';
import { logger } from '@/utils/logger';

const envFile = loadEnvFiles();

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    logger.error('Invalid configuration, refusing to start', { problems: error.problems });
    process.exit(1);
  }
  throw error;
}

const assistant = createAssistantService({
  embedder: createOpenAiEmbedder(config.openai),
  store: createQdrantStore(config.qdrant),
  chat: createOpenAiChat(config.openai),
  rag: config.rag,
});

const app = createApp({
  assistant,
  staticRoot: config.server.staticRoot,
  corsOrigins: config.server.corsOrigins,
});

const server = serve({
  fetch: app.fetch,
  hostname: config.server.host,
  port: config.server.port,
});

logger.info('Docs assistant listening', {
  url: `http://${config.server.host}:${config.server.port}`,
  envFile,
  staticRoot: config.server.staticRoot,
  chatModel: config.openai.chatModel,
  embeddingModel: config.openai.embeddingModel,
  collection: config.qdrant.collection,
  topK: config.rag.topK,
});

function gracefulShutdown(signal: string) {
  logger.info(`${signal} received: shutting down gracefully...`);
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });
  // Force exit after 10 seconds if drain takes too long
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000);
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
