/**
 * Security headers middleware.
 *
 * Sets standard security headers on every response:
 * - X-Content-Type-Options: prevents MIME-type sniffing
 * - X-Frame-Options: prevents clickjacking
 * - Referrer-Policy: limits referrer leakage
 * - Cache-Control: point data changes with every frame, never cache it
 * - HSTS: enforces HTTPS when enabled (production)
 */

import type { Context, Next } from 'hono'

export interface SecurityHeaderOptions {
  hsts: boolean
}

export function securityHeaders(options: SecurityHeaderOptions) {
  return async (c: Context, next: Next): Promise<void> => {
    await next()
    c.header('X-Content-Type-Options', 'nosniff')
    c.header('X-Frame-Options', 'DENY')
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin')
    c.header('Cache-Control', 'no-store')
    if (options.hsts) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains')
    }
  }
}
