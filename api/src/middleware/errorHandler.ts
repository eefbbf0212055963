/**
 * Error Handler
 *
 * Maps errors escaping route handlers to JSON error responses:
 * - client input → 400
 * - upstream embedding / vector store / chat failures → 503 with a generic message
 * - anything else → 500
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { InvalidRequestError } from '@/errors/request';
import { UpstreamServiceError } from '@/errors/upstream';
import { logger } from '@/utils/logger';

export const ASSISTANT_UNAVAILABLE_MESSAGE = 'Assistant is temporarily unavailable';

/**
 * Error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// Upstream and internal error text only leaves the process in development and test
export function isVerboseErrors(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

export function errorBody(code: string, message: string, details?: unknown): ErrorResponse {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

export function handleError(error: Error, c: Context): Response {
  if (error instanceof HTTPException) {
    return c.json<ErrorResponse>(
      errorBody(error.status === 400 ? 'BAD_REQUEST' : 'HTTP_ERROR', error.message),
      error.status,
    );
  }

  if (error instanceof ZodError) {
    return c.json<ErrorResponse>(
      errorBody('VALIDATION_ERROR', 'Invalid request data', error.issues),
      400,
    );
  }

  if (error instanceof InvalidRequestError) {
    return c.json<ErrorResponse>(errorBody(error.code, error.message), 400);
  }

  if (error instanceof UpstreamServiceError) {
    logger.error('Upstream service failed', {
      service: error.service,
      upstreamStatus: error.status ?? null,
      error: error.message,
      cause: error.cause ? String(error.cause) : undefined,
      path: c.req.path,
      requestId: c.get('requestId'),
    });

    return c.json<ErrorResponse>(
      errorBody(
        'ASSISTANT_UNAVAILABLE',
        ASSISTANT_UNAVAILABLE_MESSAGE,
        isVerboseErrors() ? { service: error.service, message: error.message } : undefined,
      ),
      503,
    );
  }

  logger.error('Unhandled error', {
    error: error.message,
    stack: error.stack,
    cause: error.cause ? String(error.cause) : undefined,
    path: c.req.path,
    method: c.req.method,
    requestId: c.get('requestId'),
  });

  return c.json<ErrorResponse>(
    errorBody('INTERNAL_ERROR', isVerboseErrors() ? error.message : 'An internal error occurred'),
    500,
  );
}
