import type { FastifyReply, FastifyRequest } from 'fastify';
import { AuthError } from '../errors.ts';
import { requestPath } from '../gatekeeper.ts';
import { parseBearerHeader, verifyAccessToken } from './token.ts';

/** The caller a request runs as. */
export interface AuthenticatedUser {
  userId: string;
  username: string;
  permissions: string[];
}

declare module 'fastify' {
  interface FastifyRequest {
    user: AuthenticatedUser | null;
  }
}

export interface AuthHookOptions {
  apiBasePath: string;
  jwtSecret: string;
  authDisabled: boolean;
}

export const MOCK_USER: AuthenticatedUser = {
  userId: 'mock-user',
  username: 'mock-user',
  permissions: ['read', 'write', 'admin'],
};

/**
 * Bearer token authentication. Runs after the gatekeeper, so a bad Accept
 * header is reported before a missing token.
 */
export function createAuthHook(options: AuthHookOptions) {
  const projectsPath = `${options.apiBasePath}/projects`;
  const publicPaths = new Set(['/', '/health', `${options.apiBasePath}/health`]);

  return async function authenticate(req: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const path = requestPath(req);
    if (publicPaths.has(path) || req.method === 'OPTIONS') return;

    if (options.authDisabled) {
      req.user = MOCK_USER;
      return;
    }

    const header = req.headers.authorization;
    if (!header) {
      // Clients probe this endpoint to learn whether the API is up.
      if (req.method === 'GET' && path === projectsPath) {
        throw new AuthError('Authentication required. API is available.');
      }
      throw new AuthError('Authorization header missing');
    }

    const payload = await verifyAccessToken(parseBearerHeader(header), options.jwtSecret);
    req.user = { userId: payload.sub, username: payload.username, permissions: payload.permissions };
    req.log.debug({ user: payload.username }, 'authenticated');
  };
}
