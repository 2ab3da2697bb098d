/**
 * CORS for browser-based clients of the mock, through @fastify/cors.
 *
 * `CORS_ORIGINS` is a comma-separated allowlist; `*` allows every origin.
 * Requests without an Origin header (server-to-server, curl) are always allowed.
 */
import cors from '@fastify/cors';
import type { FastifyInstance } from 'fastify';

/** Normalize a URL string to its origin, stripping paths and trailing slashes. */
function toOrigin(url: string): string {
  try {
    return new URL(url).origin;
  } catch {
    return url;
  }
}

export function registerCors(app: FastifyInstance, origins: readonly string[]): void {
  const allowAll = origins.includes('*');
  const allowed = new Set(origins.map(toOrigin));

  app.register(cors, {
    origin: (origin, callback) => {
      if (!origin || allowAll) return callback(null, true);
      // false makes @fastify/cors omit the ACAO header
      return callback(null, allowed.has(origin));
    },
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Authorization', 'Content-Type', 'Accept'],
    maxAge: 86400,
  });
}
