/**
 * Upstream Service Error
 *
 * Thrown when the embedding service, the vector store or the chat
 * completion service cannot be reached or answers with something unusable.
 * Caught by the onError handler → 503 ASSISTANT_UNAVAILABLE.
 */

export type UpstreamService = 'embedding' | 'vector_store' | 'chat';

export class UpstreamServiceError extends Error {
  readonly code = 'UPSTREAM_FAILURE' as const;
  readonly status: number | undefined;

  constructor(
    readonly service: UpstreamService,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(`${service}: ${message}`, { cause: options.cause });
    this.name = 'UpstreamServiceError';
    this.status = options.status;
  }
}
