/**
 * Header checks the real REST API applies before anything else runs.
 *
 * Registered as the first onRequest hook, so it fires ahead of auth and
 * before the body is parsed.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { ApiError } from './errors.ts';

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

export class NotAcceptableError extends ApiError {
  constructor(accept: string) {
    super(`Accept header must be '*/*', got '${accept}'`, 406, { title: 'Not Acceptable' });
    this.name = 'NotAcceptableError';
  }
}

export class UnsupportedMediaTypeError extends ApiError {
  constructor() {
    super('Content-Type must be application/json', 415, { title: 'Unsupported Media Type' });
    this.name = 'UnsupportedMediaTypeError';
  }
}

function hasBody(req: FastifyRequest): boolean {
  const length = Number(req.headers['content-length'] ?? 0);
  return length > 0 || req.headers['transfer-encoding'] !== undefined;
}

/** Path without its query string. */
export function requestPath(req: FastifyRequest): string {
  const index = req.url.indexOf('?');
  return index === -1 ? req.url : req.url.slice(0, index);
}

export function isApiPath(path: string, apiBasePath: string): boolean {
  return path === apiBasePath || path.startsWith(`${apiBasePath}/`);
}

export function createGatekeeperHook(apiBasePath: string) {
  const healthPath = `${apiBasePath}/health`;

  return async function gatekeeper(req: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const path = requestPath(req);
    if (!isApiPath(path, apiBasePath) || path === healthPath) return;

    const accept = req.headers.accept;
    if (accept && accept !== '*/*') {
      req.log.warn({ accept }, 'rejected Accept header');
      throw new NotAcceptableError(accept);
    }

    if (BODY_METHODS.has(req.method) && hasBody(req)) {
      const contentType = req.headers['content-type'] ?? '';
      if (!contentType.startsWith('application/json')) {
        throw new UnsupportedMediaTypeError();
      }
    }
  };
}
