import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { loadConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { initSentry, captureError, flushSentry } from './lib/sentry.js';
import { createOpsApp } from './routes/ops.js';
import { buildRuntime, type WorkerRuntime } from './runtime.js';

let shuttingDown = false;
let server: ReturnType<typeof serve> | null = null;
let runtime: WorkerRuntime | null = null;
let loops: Promise<void> | null = null;
const controller = new AbortController();

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  // Force exit if in-flight entries or connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 30_000).unref();

  controller.abort();
  const results = await Promise.allSettled([
    loops ?? Promise.resolve(),
    new Promise<void>((resolve) => {
      if (!server) return resolve();
      server.close(() => resolve());
    }),
  ]);
  for (const result of results) {
    if (result.status === 'rejected') {
      logger.warn({ err: result.reason }, 'Shutdown task failed');
    }
  }

  if (runtime) await runtime.close();
  await flushSentry(2000);
  logger.info('Worker process stopped');
  process.exit(signal === 'SIGTERM' || signal === 'SIGINT' ? 0 : 1);
}

export function startWorkerProcess(): void {
  if (runtime) return;

  initSentry();
  const config = loadConfig();
  const rt = buildRuntime(config);
  runtime = rt;

  logger.info(
    {
      consumers: rt.workers.map((w) => w.consumerName),
      stream: config.worker.streamKey,
      group: config.worker.group,
      streamBackend: config.streamBackend,
      cacheBackend: config.cacheBackend,
      adapter: config.adapter.kind,
    },
    'Assessment worker starting',
  );

  loops = Promise.all(
    rt.workers.map((worker) => worker.run(controller.signal).catch((err: unknown) => {
      captureError(err, { consumer: worker.consumerName, source: 'worker.run' });
      logger.error({ err, consumer: worker.consumerName }, 'Worker loop exited with error');
    })),
  ).then(() => undefined);

  const app = createOpsApp({
    metrics: rt.metrics,
    checkBroker: () => rt.checkBroker(),
    isShuttingDown: () => shuttingDown,
    consumers: rt.workers.map((w) => w.consumerName),
    metricsKey: config.metricsKey,
  });
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Ops endpoints at http://localhost:${config.port}`);

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    void shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    captureError(err, { source: 'uncaughtException' });
    logger.error({ err }, 'Uncaught exception');
    void shutdown('UNCAUGHT_EXCEPTION');
  });
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  try {
    startWorkerProcess();
  } catch (err) {
    logger.fatal({ err }, 'Worker failed to start');
    process.exit(1);
  }
}
