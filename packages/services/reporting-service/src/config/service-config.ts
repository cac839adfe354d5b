/**
 * Reporting Service configuration
 *
 * Read once from the environment at startup and handed to createApp; nothing
 * below the app factory reads process.env.
 */

import { z } from 'zod';
import { getLogger as getPlatformLogger, DomainError, type Logger } from '@opsdash/platform-core';

export const SERVICE_NAME = 'reporting-service';

const nodeEnvSchema = z.enum(['development', 'test', 'production']);

const configSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    NODE_ENV: nodeEnvSchema.default('development'),
    DATABASE_URL: z.string().trim().min(1).optional(),
    APP_NAME: z.string().trim().min(1).default('Dashboard Analytics'),
    API_PREFIX: z
      .string()
      .trim()
      .regex(/^\/[A-Za-z0-9/_-]*$/, 'must start with /')
      .default('/api/v1'),
    DEFAULT_PAGE_SIZE: z.coerce.number().int().positive().default(100),
    MAX_PAGE_SIZE: z.coerce.number().int().positive().default(1000),
    MAX_SERIES_BUCKETS: z.coerce.number().int().positive().default(3660),
    CORS_ORIGINS: z.string().trim().default('*'),
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(600),
  })
  .refine(env => env.DEFAULT_PAGE_SIZE <= env.MAX_PAGE_SIZE, {
    message: 'DEFAULT_PAGE_SIZE must not exceed MAX_PAGE_SIZE',
    path: ['DEFAULT_PAGE_SIZE'],
  });

export interface ServiceConfig {
  readonly port: number;
  readonly nodeEnv: z.infer<typeof nodeEnvSchema>;
  readonly databaseUrl?: string;
  readonly appName: string;
  readonly apiPrefix: string;
  readonly defaultPageSize: number;
  readonly maxPageSize: number;
  readonly maxSeriesBuckets: number;
  /** `true` allows any origin */
  readonly corsOrigins: true | string[];
  readonly rateLimitPerMinute: number;
}

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  return Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== '')
  );
}

/**
 * @throws DomainError when a variable is present but invalid
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const result = configSchema.safeParse(emptyToUndefined(env));
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
    throw new DomainError(
      `Invalid configuration for ${SERVICE_NAME}: ${issues.join(', ')}`,
      500,
      undefined,
      'INVALID_CONFIG',
      { issues }
    );
  }

  const parsed = result.data;
  const origins = parsed.CORS_ORIGINS.split(',')
    .map(o => o.trim())
    .filter(o => o !== '');

  const config: ServiceConfig = {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    databaseUrl: parsed.DATABASE_URL,
    appName: parsed.APP_NAME,
    apiPrefix: parsed.API_PREFIX.replace(/\/+$/, '') || '/',
    defaultPageSize: parsed.DEFAULT_PAGE_SIZE,
    maxPageSize: parsed.MAX_PAGE_SIZE,
    maxSeriesBuckets: parsed.MAX_SERIES_BUCKETS,
    corsOrigins: origins.length === 0 || origins.includes('*') ? true : origins,
    rateLimitPerMinute: parsed.RATE_LIMIT_PER_MINUTE,
  };
  return Object.freeze(config);
}

export function getLogger(name: string = SERVICE_NAME): Logger {
  return getPlatformLogger(name);
}
