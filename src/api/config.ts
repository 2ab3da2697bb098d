/**
 * Server configuration loaded from environment variables.
 *
 * Parsed once with zod and cached; call clearConfigCache() after changing
 * process.env in tests.
 */

import { z } from 'zod';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform((value) => value === 'true' || value === '1');

export const ServerConfigSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5001),
  API_BASE_PATH: z
    .string()
    .regex(/^\/[^?#]*[^/]$/, 'API_BASE_PATH must start with / and not end with /')
    .default('/polarion/rest/v1'),
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters').default('dev-secret-key-for-local-mock-only!'),
  AUTH_DISABLED: booleanFromEnv,
  TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  CORS_ORIGINS: z.string().default('*'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface ServerConfig {
  host: string;
  port: number;
  apiBasePath: string;
  jwtSecret: string;
  authDisabled: boolean;
  tokenTtlSeconds: number;
  corsOrigins: string[];
  logLevel: z.infer<typeof ServerConfigSchema>['LOG_LEVEL'];
}

let cachedConfig: ServerConfig | null = null;

/**
 * Parse a config from an environment map.
 * Throws with every offending variable listed when the environment is invalid.
 */
export function parseConfig(env: Record<string, string | undefined>): ServerConfig {
  const result = ServerConfigSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`[Config] Invalid environment: ${problems.join('; ')}`);
  }

  const raw = result.data;
  return {
    host: raw.HOST,
    port: raw.PORT,
    apiBasePath: raw.API_BASE_PATH,
    jwtSecret: raw.JWT_SECRET,
    authDisabled: raw.AUTH_DISABLED,
    tokenTtlSeconds: raw.TOKEN_TTL_SECONDS,
    corsOrigins: raw.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    logLevel: raw.LOG_LEVEL,
  };
}

export function getConfig(): ServerConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}

/**
 * Clear cached config (for testing).
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
