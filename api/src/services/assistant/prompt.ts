/**
 * Prompt assembly for documentation answers.
 *
 * Citations are labelled S1..SK in the vector store's best-first order; the
 * model is asked to cite them with the same labels.
 */

import { z } from 'zod';
import type { RagConfig } from '@/config/env';
import type { ChatMessage, Citation, HistoryTurn, RetrievedChunk } from './types';

export const EMPTY_CONTEXT = '(no matching documentation found)';
export const MAX_FOLLOWUPS = 4;
const FOLLOWUP_SOURCE_TITLES = 4;

/** Cut to `maxChars` code points, so astral characters are never split. */
export function truncateSnippet(text: string, maxChars: number): string {
  const trimmed = text.trim();
  const codePoints = Array.from(trimmed);
  if (codePoints.length <= maxChars) return trimmed;
  return `${codePoints.slice(0, maxChars).join('')}...`;
}

export function toCitations(
  chunks: RetrievedChunk[],
  options: Pick<RagConfig, 'snippetChars' | 'defaultTitle'>,
): Citation[] {
  return chunks.map((chunk, index) => ({
    label: `S${index + 1}`,
    title: chunk.title ?? options.defaultTitle,
    url: chunk.sourceUrl ?? null,
    docPath: chunk.docPath ?? null,
    section: chunk.headerPath.length > 0 ? chunk.headerPath.join(' / ') : null,
    score: chunk.score,
    snippet: truncateSnippet(chunk.text, options.snippetChars),
  }));
}

/** What the client shows for a citation: URL, else doc path, else title. */
export function sourceReference(citation: Citation): string {
  return citation.url ?? citation.docPath ?? citation.title;
}

export function buildContext(citations: Citation[]): string {
  if (citations.length === 0) return EMPTY_CONTEXT;

  return citations
    .map((citation) =>
      [
        `[${citation.label}] ${citation.title}`,
        `section: ${citation.section ?? '-'}`,
        `url: ${citation.url ?? '-'}`,
        `text: ${citation.snippet || '-'}`,
      ].join('\n'),
    )
    .join('\n\n');
}

export function buildMessages(
  options: Pick<RagConfig, 'systemPrompt' | 'answerInstruction' | 'historyTurns'>,
  query: string,
  history: HistoryTurn[],
  context: string,
): ChatMessage[] {
  const recent = options.historyTurns > 0 ? history.slice(-options.historyTurns) : [];

  return [
    { role: 'system', content: options.systemPrompt },
    ...recent.map((turn): ChatMessage => ({ role: turn.role, content: turn.text })),
    {
      role: 'user',
      content: [
        `Question:\n${query}`,
        `Context from the documentation:\n${context}`,
        options.answerInstruction,
      ].join('\n\n'),
    },
  ];
}

export function buildFollowupPrompt(query: string, answer: string, citations: Citation[]): string {
  const titles = citations
    .slice(0, FOLLOWUP_SOURCE_TITLES)
    .map((citation) => citation.title)
    .join(', ');

  return [
    `Suggest ${MAX_FOLLOWUPS} short follow-up questions the user might ask next about this answer.`,
    'Reply strictly with a JSON object of the form {"followups":["..."]} and nothing else.',
    `Original question: ${query}`,
    `Assistant answer: ${answer}`,
    `Sources: ${titles || '-'}`,
  ].join('\n');
}

const followupsSchema = z.object({
  followups: z.array(z.unknown()),
});

/**
 * Parse the model's follow-up JSON. Throws when the content is not JSON;
 * a JSON value of another shape yields no follow-ups.
 */
export function parseFollowups(content: string): string[] {
  const parsed = followupsSchema.safeParse(JSON.parse(content));
  if (!parsed.success) return [];

  return parsed.data.followups
    .map((item) => String(item).trim())
    .filter((item) => item.length > 0)
    .slice(0, MAX_FOLLOWUPS);
}
