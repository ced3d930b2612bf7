import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const EnvSchema = z.object({
  REDIS_URL: z.string().url().default('redis://localhost:6379/0'),
  DATABASE_URL: z.string().url().optional(),
  GAME_VERSION_ID: z.string().min(1).default('10th'),
  SCRAPER_SERVICE: z.string().min(1).default('wahapedia'),
  RATE_LIMIT_MIN_MS: z.coerce.number().int().nonnegative().default(2000),
  RATE_LIMIT_MAX_MS: z.coerce.number().int().nonnegative().default(3000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MESSAGE_SOURCE: z.string().min(1).default('wahapedia-scraper'),
});

export interface AppConfig {
  redisUrl: string;
  databaseUrl: string | null;
  versionId: string;
  service: string;
  rateLimit: {
    minDelayMs: number;
    maxDelayMs: number;
  };
  requestTimeoutMs: number;
  messageSource: string;
}

/**
 * Read the service configuration from the environment.
 * Callers load `.env` first (the CLI imports `dotenv/config`).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings from .env templates mean "not set"
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${issues}`);
  }

  const values = parsed.data;
  if (values.RATE_LIMIT_MIN_MS > values.RATE_LIMIT_MAX_MS) {
    throw new ConfigurationError(
      `RATE_LIMIT_MIN_MS (${values.RATE_LIMIT_MIN_MS}) must not exceed RATE_LIMIT_MAX_MS (${values.RATE_LIMIT_MAX_MS})`
    );
  }

  return {
    redisUrl: values.REDIS_URL,
    databaseUrl: values.DATABASE_URL ?? null,
    versionId: values.GAME_VERSION_ID,
    service: values.SCRAPER_SERVICE,
    rateLimit: {
      minDelayMs: values.RATE_LIMIT_MIN_MS,
      maxDelayMs: values.RATE_LIMIT_MAX_MS,
    },
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    messageSource: values.MESSAGE_SOURCE,
  };
}
