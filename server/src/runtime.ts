import { randomUUID } from 'node:crypto';
import type { Redis } from 'ioredis';
import {
  InMemoryAssessmentRepository,
  SupabaseAssessmentRepository,
  type AssessmentRepository,
} from './lib/assessment-repository.js';
import type { AppConfig } from './lib/config.js';
import { ConfigError } from './lib/errors.js';
import logger from './lib/logger.js';
import { SupabaseObjectStore, type ObjectStore } from './lib/object-store.js';
import { closeRedis, createRedisClient } from './lib/redis-client.js';
import { InMemoryStageCache, RedisStageCache, type StageCache } from './lib/stage-cache.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import { WorkerMetrics } from './lib/worker-metrics.js';
import { createStageAdapter } from './pipeline/adapters/registry.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { InMemoryDeliveryLedger, RedisDeliveryLedger, type DeliveryLedger } from './worker/delivery-ledger.js';
import { InMemoryStreamLog } from './worker/memory-stream-log.js';
import { RedisStreamLog } from './worker/redis-stream-log.js';
import type { StreamLog } from './worker/stream-log.js';
import { StreamWorker } from './worker/stream-worker.js';

export interface WorkerRuntime {
  workers: StreamWorker[];
  metrics: WorkerMetrics;
  /** Log for producers in this process; on the control connection in Redis mode. */
  producerLog: StreamLog;
  repository: AssessmentRepository;
  checkBroker(): Promise<boolean>;
  close(): Promise<void>;
}

export function consumerNames(base: string | null, count: number): string[] {
  const prefix = base ?? `worker-${randomUUID().replace(/-/g, '').slice(0, 8)}`;
  if (count === 1) return [prefix];
  return Array.from({ length: count }, (_, i) => `${prefix}-${i + 1}`);
}

/**
 * Constructs every client and component the worker process needs from
 * configuration. Nothing here connects eagerly; Redis clients connect on
 * their first command. `close()` releases all of them.
 */
export function buildRuntime(config: AppConfig): WorkerRuntime {
  const redisClients: Redis[] = [];
  const needsRedis = config.streamBackend === 'redis' || config.cacheBackend === 'redis';
  const control = needsRedis ? createRedisClient(config.redisUrl, 'control') : null;
  if (control) redisClients.push(control);

  let cache: StageCache;
  if (config.cacheBackend === 'redis' && control) {
    cache = new RedisStageCache(control, config.cacheTtlSeconds);
  } else {
    cache = new InMemoryStageCache(config.cacheTtlSeconds);
  }

  const supabase = config.supabase
    ? createSupabaseAdmin(config.supabase.url, config.supabase.serviceRoleKey)
    : null;

  let repository: AssessmentRepository;
  if (config.repository === 'supabase') {
    if (!supabase) throw new ConfigError('Supabase repository selected without Supabase credentials');
    repository = new SupabaseAssessmentRepository(supabase);
  } else {
    repository = new InMemoryAssessmentRepository();
  }

  const objectStore: ObjectStore | null = supabase ? new SupabaseObjectStore(supabase) : null;
  if (!config.worker.storageBucket) {
    logger.info('STORAGE_BUCKET not set; entries with a storage_key will fail processing');
  }

  const orchestrator = new PipelineOrchestrator({
    adapter: createStageAdapter(config.adapter),
    cache,
    repository,
    cacheTtlSeconds: config.cacheTtlSeconds,
  });

  const metrics = new WorkerMetrics();
  const names = consumerNames(config.worker.consumerName, config.worker.consumers);
  const streamOptions = {
    streamKey: config.worker.streamKey,
    group: config.worker.group,
    dlqKey: config.worker.dlqKey,
  };

  let ledger: DeliveryLedger;
  const logs: StreamLog[] = [];
  if (config.streamBackend === 'redis' && control) {
    ledger = new RedisDeliveryLedger(control);
    // Blocking reads hold a connection, so each consumer gets its own.
    for (const name of names) {
      const client = createRedisClient(config.redisUrl, name);
      redisClients.push(client);
      logs.push(new RedisStreamLog(client, streamOptions));
    }
  } else {
    ledger = new InMemoryDeliveryLedger();
    const shared = new InMemoryStreamLog();
    for (let i = 0; i < names.length; i += 1) logs.push(shared);
  }

  const workers = names.map((consumerName, i) => new StreamWorker({
    consumerName,
    log: logs[i],
    ledger,
    pipeline: orchestrator,
    objectStore,
    settings: config.worker,
    metrics,
  }));

  return {
    workers,
    metrics,
    producerLog: config.streamBackend === 'redis' && control ? new RedisStreamLog(control, streamOptions) : logs[0],
    repository,
    async checkBroker() {
      if (!control) return true;
      return (await control.ping()) === 'PONG';
    },
    async close() {
      await Promise.all(redisClients.map((client) => closeRedis(client)));
    },
  };
}
