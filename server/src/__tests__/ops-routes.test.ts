import { describe, it, expect, vi } from 'vitest';
import { WorkerMetrics } from '../lib/worker-metrics.js';
import { createOpsApp, type OpsDeps } from '../routes/ops.js';

function build(overrides: Partial<OpsDeps> = {}) {
  const metrics = new WorkerMetrics();
  const app = createOpsApp({
    metrics,
    checkBroker: async () => true,
    isShuttingDown: () => false,
    consumers: ['worker-a-1', 'worker-a-2'],
    ...overrides,
  });
  return { app, metrics };
}

describe('ops routes', () => {
  it('reports health with no-store caching', async () => {
    const { app } = build();
    const res = await app.request('http://test/health');

    expect(res.status).toBe(200);
    expect(res.headers.get('cache-control')).toBe('no-store');
    const body = await res.json();
    expect(body).toMatchObject({ status: 'ok', shutting_down: false, consumers: 2 });
  });

  it('reports draining while shutting down', async () => {
    const { app } = build({ isShuttingDown: () => true });

    const health = await (await app.request('http://test/health')).json();
    expect(health).toMatchObject({ status: 'draining', shutting_down: true });

    const ready = await app.request('http://test/ready');
    expect(ready.status).toBe(503);
    expect(await ready.json()).toMatchObject({ ready: false, broker_ok: false });
  });

  it('is ready when the broker answers', async () => {
    const { app } = build();
    const res = await app.request('http://test/ready');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ready: true, shutting_down: false, broker_ok: true });
  });

  it('is not ready when the broker check throws', async () => {
    const checkBroker = vi.fn(async () => {
      throw new Error('ECONNREFUSED');
    });
    const { app } = build({ checkBroker });

    const res = await app.request('http://test/ready');

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ ready: false, broker_ok: false });
    expect(checkBroker).toHaveBeenCalledTimes(1);
  });

  it('exposes worker counters on /metrics', async () => {
    const { app, metrics } = build({ startedAt: Date.now() - 5_000 });
    metrics.recordReceived(false);
    metrics.recordOutcome('succeeded', 120);

    const res = await app.request('http://test/metrics');

    expect(res.status).toBe(200);
    expect(res.headers.get('cache-control')).toBe('no-store');
    const body = await res.json() as {
      consumers: string[];
      uptime_seconds: number;
      worker_runtime: { counters: { succeeded: number } };
    };
    expect(body.consumers).toEqual(['worker-a-1', 'worker-a-2']);
    expect(body.worker_runtime.counters.succeeded).toBe(1);
    expect(body.uptime_seconds).toBeGreaterThanOrEqual(5);
  });

  it('requires the bearer key on /metrics when configured', async () => {
    const { app } = build({ metricsKey: 'test-secret' });

    const denied = await app.request('http://test/metrics');
    expect(denied.status).toBe(401);

    const allowed = await app.request('http://test/metrics', {
      headers: { Authorization: 'Bearer test-secret' },
    });
    expect(allowed.status).toBe(200);
  });

  it('returns JSON 404 for unknown paths', async () => {
    const { app } = build();
    const res = await app.request('http://test/api/jobs');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
