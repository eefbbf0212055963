export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** Prior turn supplied by the client. */
export interface HistoryTurn {
  role: 'user' | 'assistant';
  text: string;
}

/** Documentation chunk returned by the vector store. */
export interface RetrievedChunk {
  text: string;
  score: number;
  title?: string;
  sourceUrl?: string;
  docPath?: string;
  headerPath: string[];
}

/** Retrieved chunk as shown to the model and returned to the client. */
export interface Citation {
  label: string;
  title: string;
  url: string | null;
  docPath: string | null;
  section: string | null;
  score: number;
  snippet: string;
}

export interface AssistantQuery {
  query: string;
  history?: HistoryTurn[];
  topK?: number;
  followups?: boolean;
}

export interface AssistantAnswer {
  answer: string;
  sources: string[];
  citations: Citation[];
  followups?: string[];
}

/** Retrieval result plus the chat messages built from it. */
export interface PreparedPrompt {
  query: string;
  messages: ChatMessage[];
  citations: Citation[];
  sources: string[];
}

export type AssistantStreamEvent =
  | { type: 'delta'; delta: string }
  | { type: 'final'; answer: AssistantAnswer };

export interface EmbeddingClient {
  embed(text: string): Promise<number[]>;
}

export interface VectorStore {
  search(vector: number[], limit: number): Promise<RetrievedChunk[]>;
}

export interface ChatCompletionOptions {
  temperature: number;
  responseFormat?: 'json_object';
}

export interface ChatClient {
  complete(messages: ChatMessage[], options: ChatCompletionOptions): Promise<string>;
  stream(messages: ChatMessage[], options: ChatCompletionOptions): AsyncIterable<string>;
}
