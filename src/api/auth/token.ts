import { randomUUID } from 'node:crypto';
import { SignJWT, jwtVerify, errors as joseErrors } from 'jose';
import type { JWTVerifyResult } from 'jose';
import { AuthError } from '../errors.ts';

/** Claims carried by a mock access token. */
export interface TokenPayload {
  /** Subject: the user id. */
  sub: string;
  username: string;
  permissions: string[];
  iat: number;
  exp: number;
  jti: string;
}

export interface SignOptions {
  secret: string;
  ttlSeconds: number;
  username?: string;
  permissions?: string[];
}

const ALG = 'HS256' as const;
const DEFAULT_PERMISSIONS = ['read', 'write', 'admin'];

function encodeSecret(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Signs an HS256 bearer token for the given user id.
 *
 * @returns Compact JWS string.
 */
export async function signAccessToken(userId: string, options: SignOptions): Promise<string> {
  return new SignJWT({
    username: options.username ?? userId,
    permissions: options.permissions ?? DEFAULT_PERMISSIONS,
  })
    .setProtectedHeader({ alg: ALG })
    .setSubject(userId)
    .setIssuedAt()
    .setExpirationTime(`${options.ttlSeconds}s`)
    .setJti(randomUUID())
    .sign(encodeSecret(options.secret));
}

/**
 * Verifies a bearer token. Every failure is an AuthError whose message is
 * what the client sees.
 */
export async function verifyAccessToken(token: string, secret: string): Promise<TokenPayload> {
  let verified: JWTVerifyResult;
  try {
    verified = await jwtVerify(token, encodeSecret(secret), {
      algorithms: [ALG],
      requiredClaims: ['sub', 'iat', 'exp'],
    });
  } catch (err) {
    if (err instanceof joseErrors.JWTExpired) {
      throw new AuthError('Token has expired');
    }
    throw new AuthError(`Invalid token: ${err instanceof Error ? err.message : String(err)}`);
  }

  const { payload } = verified;
  const { sub, iat, exp } = payload;
  if (typeof sub !== 'string' || typeof iat !== 'number' || typeof exp !== 'number') {
    throw new AuthError('Invalid token: missing required claims');
  }

  const permissions = Array.isArray(payload.permissions)
    ? payload.permissions.filter((p): p is string => typeof p === 'string')
    : [];

  return {
    sub,
    username: typeof payload.username === 'string' ? payload.username : sub,
    permissions,
    iat,
    exp,
    jti: typeof payload.jti === 'string' ? payload.jti : '',
  };
}

/**
 * Extract the token from an `Authorization: Bearer <token>` header value.
 */
export function parseBearerHeader(header: string): string {
  const parts = header.trim().split(/\s+/);
  const [scheme, token] = parts;
  if (parts.length !== 2 || scheme?.toLowerCase() !== 'bearer' || !token) {
    throw new AuthError('Invalid authorization header format. Expected: Bearer <token>');
  }
  return token;
}
