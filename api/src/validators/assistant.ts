/**
 * Assistant Validation Schemas
 *
 * Zod schemas for assistant endpoint request validation
 */

import { z } from 'zod';

const MAX_QUERY_CHARS = 4000;
const MAX_TURN_CHARS = 6000;
const MAX_HISTORY_TURNS = 50;
const MAX_TOP_K = 12;

/**
 * Prior conversation turn supplied by the client
 */
const historyTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  text: z.string().trim().min(1).max(MAX_TURN_CHARS),
}).strict();

/**
 * Assistant request body
 * POST /api/assistant
 * POST /api/assistant/stream
 */
export const assistantRequestSchema = z.object({
  query: z.string().trim().min(1, { message: 'query must not be empty' }).max(MAX_QUERY_CHARS),
  history: z.array(historyTurnSchema).max(MAX_HISTORY_TURNS).optional().default([]),
  topK: z.number().int().min(1).max(MAX_TOP_K).optional(),
  followups: z.boolean().optional().default(false),
}).strict();
