import type { Context } from 'hono';
import type { ZodError } from 'zod';
import { errorBody, type ErrorResponse } from '@/middleware/errorHandler';

/**
 * zValidator hook: reply with the shared error format instead of the raw zod result.
 */
export function validationHook(
  result: { success: true } | { success: false; error: ZodError },
  c: Context,
) {
  if (!result.success) {
    return c.json<ErrorResponse>(
      errorBody('VALIDATION_ERROR', 'Invalid request data', result.error.issues),
      400,
    );
  }
}
