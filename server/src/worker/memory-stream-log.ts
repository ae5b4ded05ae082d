import type { DeadLetterEntry, PendingEntry, StreamEntry, StreamLog } from './stream-log.js';

interface PendingState {
  consumer: string;
  deliveredAt: number;
  deliveries: number;
}

function compareIds(a: string, b: string): number {
  const [aMs, aSeq] = a.split('-').map(Number);
  const [bMs, bSeq] = b.split('-').map(Number);
  return aMs - bMs || aSeq - bSeq;
}

/**
 * Process-local consumer-group log with the same delivery rules as Redis
 * Streams: one group, a pending list per entry, deletion independent of ack.
 * Used when STREAM_BACKEND=memory and as the broker stand-in in tests.
 */
export class InMemoryStreamLog implements StreamLog {
  private readonly entries = new Map<string, Record<string, string>>();
  private readonly pending = new Map<string, PendingState>();
  private readonly dlq: Array<{ id: string } & DeadLetterEntry> = [];
  private groupReady = false;
  private lastDelivered = '0-0';
  private lastMs = 0;
  private seq = 0;
  private waiters: Array<() => void> = [];

  constructor(private readonly now: () => number = Date.now) {}

  async ensureGroup(): Promise<void> {
    // Matches `$`: entries appended before the group existed are never delivered.
    if (this.groupReady) return;
    this.groupReady = true;
    const ids = [...this.entries.keys()];
    if (ids.length > 0) this.lastDelivered = ids[ids.length - 1];
  }

  async append(fields: Record<string, string>): Promise<string> {
    const id = this.nextId();
    this.entries.set(id, { ...fields });
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
    return id;
  }

  async readNew(consumer: string, count: number, blockMs: number): Promise<StreamEntry[]> {
    this.assertGroup();
    let batch = this.undelivered(count);
    if (batch.length === 0 && blockMs > 0) {
      await this.waitForAppend(blockMs);
      batch = this.undelivered(count);
    }

    const deliveredAt = this.now();
    for (const entry of batch) {
      this.pending.set(entry.id, { consumer, deliveredAt, deliveries: 1 });
      this.lastDelivered = entry.id;
    }
    return batch;
  }

  async listPending(count: number, minIdleMs = 0): Promise<PendingEntry[]> {
    this.assertGroup();
    const now = this.now();
    return [...this.pending.entries()]
      .filter(([, state]) => now - state.deliveredAt >= minIdleMs)
      .sort(([a], [b]) => compareIds(a, b))
      .slice(0, count)
      .map(([id, state]) => ({
        id,
        consumer: state.consumer,
        idleMs: now - state.deliveredAt,
        deliveries: state.deliveries,
      }));
  }

  async claim(consumer: string, minIdleMs: number, ids: string[]): Promise<StreamEntry[]> {
    this.assertGroup();
    const now = this.now();
    const claimed: StreamEntry[] = [];
    for (const id of ids) {
      const state = this.pending.get(id);
      if (!state || now - state.deliveredAt < minIdleMs) continue;
      state.consumer = consumer;
      state.deliveredAt = now;
      state.deliveries += 1;
      const fields = this.entries.get(id);
      if (fields) claimed.push({ id, fields: { ...fields } });
    }
    return claimed;
  }

  async ack(id: string): Promise<void> {
    this.pending.delete(id);
  }

  async remove(id: string): Promise<void> {
    this.entries.delete(id);
  }

  async deadLetter(entry: DeadLetterEntry): Promise<string> {
    const id = this.nextId();
    this.dlq.push({ id, ...entry });
    return id;
  }

  /** Entries still in the log, acked or not. */
  get length(): number {
    return this.entries.size;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get deadLetters(): ReadonlyArray<{ id: string } & DeadLetterEntry> {
    return this.dlq;
  }

  private undelivered(count: number): StreamEntry[] {
    const batch: StreamEntry[] = [];
    for (const [id, fields] of this.entries) {
      if (batch.length >= count) break;
      if (compareIds(id, this.lastDelivered) <= 0) continue;
      batch.push({ id, fields: { ...fields } });
    }
    return batch;
  }

  private waitForAppend(blockMs: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((w) => w !== wake);
        resolve();
      }, blockMs);
      const wake = () => {
        clearTimeout(timer);
        resolve();
      };
      this.waiters.push(wake);
    });
  }

  private assertGroup(): void {
    if (!this.groupReady) {
      throw new Error('NOGROUP No such consumer group for in-memory stream');
    }
  }

  private nextId(): string {
    const ms = Math.max(this.now(), this.lastMs);
    this.seq = ms === this.lastMs ? this.seq + 1 : 0;
    this.lastMs = ms;
    return `${ms}-${this.seq}`;
  }
}
