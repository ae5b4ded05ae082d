import { Hono } from 'hono';
import logger from '../lib/logger.js';
import type { WorkerMetrics } from '../lib/worker-metrics.js';

export interface OpsDeps {
  metrics: WorkerMetrics;
  /** Broker reachability; false or a throw marks the process not ready. */
  checkBroker: () => Promise<boolean>;
  isShuttingDown: () => boolean;
  consumers: readonly string[];
  startedAt?: number;
  /** When set, GET /metrics requires `Authorization: Bearer <key>`. */
  metricsKey?: string | null;
}

function getHeapUsedMb() {
  return Math.round(process.memoryUsage().heapUsed / 1024 / 1024);
}

/**
 * Operational endpoints for the worker process. No job submission or
 * assessment CRUD is exposed here.
 */
export function createOpsApp(deps: OpsDeps) {
  const app = new Hono();
  const startedAt = deps.startedAt ?? Date.now();

  async function brokerOk(): Promise<boolean> {
    try {
      return await deps.checkBroker();
    } catch (err) {
      logger.warn({ err }, 'Broker readiness check failed');
      return false;
    }
  }

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    const shuttingDown = deps.isShuttingDown();
    return c.json({
      status: shuttingDown ? 'draining' : 'ok',
      shutting_down: shuttingDown,
      consumers: deps.consumers.length,
      heap_used_mb: getHeapUsedMb(),
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/ready', async (c) => {
    c.header('Cache-Control', 'no-store');
    const shuttingDown = deps.isShuttingDown();
    const brokerReady = shuttingDown ? false : await brokerOk();
    const ready = !shuttingDown && brokerReady;
    return c.json({
      ready,
      shutting_down: shuttingDown,
      broker_ok: brokerReady,
      timestamp: new Date().toISOString(),
    }, ready ? 200 : 503);
  });

  app.get('/metrics', (c) => {
    c.header('Cache-Control', 'no-store');
    if (deps.metricsKey && c.req.header('Authorization') !== `Bearer ${deps.metricsKey}`) {
      return c.json({ error: 'Unauthorized' }, 401);
    }

    const memUsage = process.memoryUsage();
    return c.json({
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      shutting_down: deps.isShuttingDown(),
      consumers: deps.consumers,
      worker_runtime: deps.metrics.snapshot(),
      memory: {
        rss_mb: Math.round(memUsage.rss / 1024 / 1024),
        heap_used_mb: Math.round(memUsage.heapUsed / 1024 / 1024),
        heap_total_mb: Math.round(memUsage.heapTotal / 1024 / 1024),
      },
      node_version: process.version,
    });
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    logger.error({ err, path: c.req.path }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
