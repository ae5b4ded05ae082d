import { z } from 'zod';
import { ConfigError } from './errors.js';

function envBool(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => (val === undefined ? fallback : val === '1' || val.toLowerCase() === 'true'));
}

function envInt(fallback: number, min = 0) {
  return z.coerce.number().int().min(min).default(fallback);
}

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: envInt(3002, 1),

  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  STREAM_BACKEND: z.enum(['redis', 'memory']).default('redis'),
  STREAM_KEY: z.string().min(1).default('pipeline:stream'),
  STREAM_GROUP: z.string().min(1).default('pipeline:group'),
  DLQ_KEY: z.string().min(1).default('pipeline:dlq'),

  WORKER_CONSUMERS: envInt(1, 1),
  WORKER_CONSUMER_NAME: z.string().min(1).optional(),
  WORKER_MAX_RETRIES: envInt(5, 1),
  WORKER_CLAIM_IDLE_MS: envInt(30_000),
  WORKER_READ_BLOCK_MS: envInt(5_000),
  WORKER_READ_COUNT: envInt(1, 1),
  WORKER_PENDING_SCAN_COUNT: envInt(10, 1),
  WORKER_LOOP_ERROR_BACKOFF_MS: envInt(1_000),

  CACHE_BACKEND: z.enum(['redis', 'memory']).default('redis'),
  CACHE_TTL_SECONDS: envInt(86_400, 1),

  STAGE_ADAPTER: z.enum(['local', 'http']).default('local'),
  STAGE_ADAPTER_FALLBACK: envBool(true),
  STAGE_ADAPTER_HTTP_URL: z.string().url().optional(),
  STAGE_ADAPTER_API_KEY: z.string().min(1).optional(),
  STAGE_ADAPTER_TIMEOUT_MS: envInt(10_000, 1),
  STAGE_ADAPTER_RETRIES: envInt(2),
  STAGE_ADAPTER_BACKOFF_MS: envInt(500),
  STAGE_ADAPTER_BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),

  ASSESSMENT_REPOSITORY: z.enum(['supabase', 'memory']).default('memory'),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  STORAGE_BUCKET: z.string().min(1).optional(),

  METRICS_KEY: z.string().min(1).optional(),
});

export type AdapterKind = 'local' | 'http';

export interface HttpAdapterConfig {
  url: string;
  apiKey: string | null;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  backoffMultiplier: number;
}

export interface WorkerConfig {
  streamKey: string;
  group: string;
  dlqKey: string;
  consumers: number;
  consumerName: string | null;
  maxRetries: number;
  claimIdleMs: number;
  readBlockMs: number;
  readCount: number;
  pendingScanCount: number;
  loopErrorBackoffMs: number;
  storageBucket: string | null;
}

export interface AppConfig {
  env: string;
  port: number;
  redisUrl: string;
  streamBackend: 'redis' | 'memory';
  cacheBackend: 'redis' | 'memory';
  cacheTtlSeconds: number;
  adapter: {
    kind: AdapterKind;
    fallback: boolean;
    http: HttpAdapterConfig | null;
  };
  repository: 'supabase' | 'memory';
  supabase: { url: string; serviceRoleKey: string } | null;
  worker: WorkerConfig;
  metricsKey: string | null;
}

/**
 * Reads and validates process configuration. Called once at startup; the
 * returned object is passed to every component that needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  if (e.STAGE_ADAPTER === 'http' && !e.STAGE_ADAPTER_HTTP_URL) {
    throw new ConfigError('STAGE_ADAPTER_HTTP_URL is required when STAGE_ADAPTER=http');
  }
  if (e.ASSESSMENT_REPOSITORY === 'supabase' && (!e.SUPABASE_URL || !e.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new ConfigError(
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when ASSESSMENT_REPOSITORY=supabase',
    );
  }

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    redisUrl: e.REDIS_URL,
    streamBackend: e.STREAM_BACKEND,
    cacheBackend: e.CACHE_BACKEND,
    cacheTtlSeconds: e.CACHE_TTL_SECONDS,
    adapter: {
      kind: e.STAGE_ADAPTER,
      fallback: e.STAGE_ADAPTER_FALLBACK,
      http: e.STAGE_ADAPTER_HTTP_URL
        ? {
            url: e.STAGE_ADAPTER_HTTP_URL,
            apiKey: e.STAGE_ADAPTER_API_KEY ?? null,
            timeoutMs: e.STAGE_ADAPTER_TIMEOUT_MS,
            retries: e.STAGE_ADAPTER_RETRIES,
            backoffMs: e.STAGE_ADAPTER_BACKOFF_MS,
            backoffMultiplier: e.STAGE_ADAPTER_BACKOFF_MULTIPLIER,
          }
        : null,
    },
    repository: e.ASSESSMENT_REPOSITORY,
    supabase: e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
      ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
      : null,
    worker: {
      streamKey: e.STREAM_KEY,
      group: e.STREAM_GROUP,
      dlqKey: e.DLQ_KEY,
      consumers: e.WORKER_CONSUMERS,
      consumerName: e.WORKER_CONSUMER_NAME ?? null,
      maxRetries: e.WORKER_MAX_RETRIES,
      claimIdleMs: e.WORKER_CLAIM_IDLE_MS,
      readBlockMs: e.WORKER_READ_BLOCK_MS,
      readCount: e.WORKER_READ_COUNT,
      pendingScanCount: e.WORKER_PENDING_SCAN_COUNT,
      loopErrorBackoffMs: e.WORKER_LOOP_ERROR_BACKOFF_MS,
      storageBucket: e.STORAGE_BUCKET ?? null,
    },
    metricsKey: e.METRICS_KEY ?? null,
  };
}
