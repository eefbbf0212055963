/**
 * Security Headers Middleware
 *
 * Sets standard security headers on all responses to prevent:
 * - Clickjacking from other origins (X-Frame-Options)
 * - MIME sniffing (X-Content-Type-Options)
 * - Referrer leakage (Referrer-Policy)
 * - Unnecessary browser features (Permissions-Policy)
 *
 * No Content-Security-Policy: the mirrored portal pages ship their own inline scripts.
 */

import type { Context, Next } from 'hono';

export async function securityHeaders(c: Context, next: Next) {
  await next();
  c.header('X-Frame-Options', 'SAMEORIGIN');
  c.header('X-Content-Type-Options', 'nosniff');
  c.header('Referrer-Policy', 'strict-origin-when-cross-origin');
  c.header('Permissions-Policy', 'camera=(), microphone=(), geolocation=()');
}
