#!/usr/bin/env node
/**
 * CLI script to print a bearer token the mock server accepts.
 *
 * Usage:
 *   npm run token
 *   npm run token -- --user john.doe --ttl 86400
 *
 * Environment:
 *   JWT_SECRET         the secret the server verifies with (server default if unset)
 *   TOKEN_TTL_SECONDS  default lifetime
 *
 * Options:
 *   --user <id>   Subject of the token (default: admin)
 *   --ttl <secs>  Lifetime in seconds (default: TOKEN_TTL_SECONDS)
 */

import { signAccessToken } from '../src/api/auth/token.ts';
import { getConfig } from '../src/api/config.ts';

function parseArgs(args: string[], defaultTtl: number): { userId: string; ttlSeconds: number } {
  let userId = 'admin';
  let ttlSeconds = defaultTtl;

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--user' && value) {
      userId = value;
      i++;
    } else if (args[i] === '--ttl' && value) {
      const parsed = Number.parseInt(value, 10);
      if (!Number.isInteger(parsed) || parsed < 1) {
        throw new Error(`--ttl must be a positive integer, got '${value}'`);
      }
      ttlSeconds = parsed;
      i++;
    }
  }

  return { userId, ttlSeconds };
}

async function main(): Promise<void> {
  const config = getConfig();
  const { userId, ttlSeconds } = parseArgs(process.argv.slice(2), config.tokenTtlSeconds);

  const token = await signAccessToken(userId, { secret: config.jwtSecret, ttlSeconds });

  console.error(`User:    ${userId}`);
  console.error(`Expires: ${new Date(Date.now() + ttlSeconds * 1000).toISOString()}`);
  console.error('');
  console.error('Send it as: Authorization: Bearer <token>');
  console.error('');
  console.log(token);
}

main().catch((err: unknown) => {
  console.error('Failed to generate token:', err instanceof Error ? err.message : err);
  process.exit(1);
});
