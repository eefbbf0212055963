/**
 * Hono Type Extensions
 *
 * Custom types for Hono context variables
 */

import type { RequestIdVariables } from 'hono/request-id';

/**
 * Environment variables for Hono context
 */
export type HonoEnv = {
  Variables: RequestIdVariables;
};
