const LATENCY_BUCKETS_MS = [50, 100, 250, 500, 1000, 2000, 5000, 10000, 30000];

export type WorkerOutcome =
  | 'succeeded'
  | 'failed'
  | 'duplicate'
  | 'dead_lettered';

interface WorkerCounters {
  received: number;
  reclaimed: number;
  succeeded: number;
  failed: number;
  duplicate: number;
  dead_lettered: number;
  stage_errors: number;
  loop_errors: number;
}

function emptyCounters(): WorkerCounters {
  return {
    received: 0,
    reclaimed: 0,
    succeeded: 0,
    failed: 0,
    duplicate: 0,
    dead_lettered: 0,
    stage_errors: 0,
    loop_errors: 0,
  };
}

/**
 * Counters and a processing-latency histogram shared by every consumer loop
 * in the process. Exposed on GET /metrics.
 */
export class WorkerMetrics {
  private counters = emptyCounters();
  private latencyCount = 0;
  private latencySumMs = 0;
  private readonly latencyHistogram = new Array<number>(LATENCY_BUCKETS_MS.length + 1).fill(0);

  recordReceived(reclaimed: boolean): void {
    this.counters.received += 1;
    if (reclaimed) this.counters.reclaimed += 1;
  }

  recordOutcome(outcome: WorkerOutcome, latencyMs?: number): void {
    this.counters[outcome] += 1;
    if (latencyMs !== undefined) this.observeLatency(latencyMs);
  }

  recordStageErrors(count: number): void {
    this.counters.stage_errors += count;
  }

  recordLoopError(): void {
    this.counters.loop_errors += 1;
  }

  snapshot() {
    return {
      counters: { ...this.counters },
      latency: {
        count: this.latencyCount,
        avg_ms: this.latencyCount > 0 ? Math.round((this.latencySumMs / this.latencyCount) * 100) / 100 : 0,
        p50_ms_upper_bound: this.estimatePercentile(0.5),
        p95_ms_upper_bound: this.estimatePercentile(0.95),
        p99_ms_upper_bound: this.estimatePercentile(0.99),
        buckets_ms: LATENCY_BUCKETS_MS,
        histogram: [...this.latencyHistogram],
      },
    };
  }

  reset(): void {
    this.counters = emptyCounters();
    this.latencyCount = 0;
    this.latencySumMs = 0;
    this.latencyHistogram.fill(0);
  }

  private observeLatency(ms: number): void {
    this.latencyCount += 1;
    this.latencySumMs += ms;
    const idx = LATENCY_BUCKETS_MS.findIndex((limit) => ms <= limit);
    const bucketIndex = idx >= 0 ? idx : LATENCY_BUCKETS_MS.length;
    this.latencyHistogram[bucketIndex] += 1;
  }

  private estimatePercentile(p: number): number {
    if (this.latencyCount <= 0) return 0;
    const target = Math.max(1, Math.ceil(this.latencyCount * p));
    let running = 0;
    for (let i = 0; i < this.latencyHistogram.length; i += 1) {
      running += this.latencyHistogram[i];
      if (running >= target) {
        return i < LATENCY_BUCKETS_MS.length ? LATENCY_BUCKETS_MS[i] : LATENCY_BUCKETS_MS[LATENCY_BUCKETS_MS.length - 1];
      }
    }
    return LATENCY_BUCKETS_MS[LATENCY_BUCKETS_MS.length - 1];
  }
}
