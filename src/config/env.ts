import { z } from 'zod';
import 'dotenv/config';

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter(Boolean)
  );

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),

  ELASTIC_HOST: z.string().url().default('http://elasticsearch:9200'),
  SEARCH_INDEX: z.string().min(1).default('business-search'),
  REDIS_URL: z.string().min(1).default('redis://redis:6379/0'),

  CORS_ORIGINS: commaList,

  BACKEND_TIMEOUT_MS: z.coerce.number().int().min(100).max(10_000).default(1500),
  HEALTH_PROBE_INTERVAL_MS: z.coerce.number().int().min(1000).default(5000),

  PROPAGATION_WORKERS: z.coerce.number().int().min(1).max(16).default(1),
  PROPAGATION_BASE_BACKOFF_MS: z.coerce.number().int().min(10).default(500),
  PROPAGATION_MAX_BACKOFF_MS: z.coerce.number().int().min(100).default(30_000),

  SWEEP_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),
  OFFER_VALIDITY_DAYS: z.coerce.number().int().min(1).default(30),
  INSTALLATION_GRACE_DAYS: z.coerce.number().int().min(0).default(3),
  STALE_OFFER_DAYS: z.coerce.number().int().min(1).default(5),

  OPTIONS_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(43_200),
});

const result = envSchema.safeParse(process.env);

if (!result.success) {
  console.error('Invalid environment variables:');
  console.error(result.error.flatten().fieldErrors);
  throw new Error('Invalid environment variables');
}

export const env = result.data;
export type Env = z.infer<typeof envSchema>;
