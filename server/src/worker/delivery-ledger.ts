import type { Redis } from 'ioredis';

export const PROCESSED_TTL_SECONDS = 60 * 60 * 24 * 7;
export const RETRY_TTL_SECONDS = 60 * 60 * 24;

export function processedKey(idempotencyKey: string): string {
  return `processed:${idempotencyKey}`;
}

export function retriesKey(entryId: string): string {
  return `retries:${entryId}`;
}

/**
 * Broker-side bookkeeping shared by every consumer in a group: set-once
 * idempotency markers and per-entry failure counters.
 */
export interface DeliveryLedger {
  /** Returns false when the marker already existed. */
  markProcessed(idempotencyKey: string): Promise<boolean>;
  releaseProcessed(idempotencyKey: string): Promise<void>;
  /** Returns the counter value after the increment. */
  incrementRetries(entryId: string): Promise<number>;
  clearRetries(entryId: string): Promise<void>;
}

type LedgerRedis = Pick<Redis, 'set' | 'del' | 'multi'>;

export class RedisDeliveryLedger implements DeliveryLedger {
  constructor(private readonly redis: LedgerRedis) {}

  async markProcessed(idempotencyKey: string): Promise<boolean> {
    // Single SET NX EX so the marker never exists without its expiry.
    const reply = await this.redis.set(processedKey(idempotencyKey), '1', 'EX', PROCESSED_TTL_SECONDS, 'NX');
    return reply === 'OK';
  }

  async releaseProcessed(idempotencyKey: string): Promise<void> {
    await this.redis.del(processedKey(idempotencyKey));
  }

  async incrementRetries(entryId: string): Promise<number> {
    const key = retriesKey(entryId);
    // Counter and expiry in one transaction.
    const replies = await this.redis.multi().incr(key).expire(key, RETRY_TTL_SECONDS).exec();
    const [incrReply] = replies ?? [];
    if (!incrReply) throw new Error(`MULTI for ${key} was aborted`);
    const [err, count] = incrReply;
    if (err) throw err;
    if (typeof count !== 'number') throw new Error(`INCR ${key} returned ${String(count)}`);
    return count;
  }

  async clearRetries(entryId: string): Promise<void> {
    await this.redis.del(retriesKey(entryId));
  }
}

interface Expiring {
  value: number;
  expiresAt: number;
}

export class InMemoryDeliveryLedger implements DeliveryLedger {
  private readonly store = new Map<string, Expiring>();

  constructor(private readonly now: () => number = Date.now) {}

  async markProcessed(idempotencyKey: string): Promise<boolean> {
    const key = processedKey(idempotencyKey);
    if (this.live(key)) return false;
    this.store.set(key, { value: 1, expiresAt: this.now() + PROCESSED_TTL_SECONDS * 1000 });
    return true;
  }

  async releaseProcessed(idempotencyKey: string): Promise<void> {
    this.store.delete(processedKey(idempotencyKey));
  }

  async incrementRetries(entryId: string): Promise<number> {
    const key = retriesKey(entryId);
    const value = (this.live(key)?.value ?? 0) + 1;
    this.store.set(key, { value, expiresAt: this.now() + RETRY_TTL_SECONDS * 1000 });
    return value;
  }

  async clearRetries(entryId: string): Promise<void> {
    this.store.delete(retriesKey(entryId));
  }

  has(key: string): boolean {
    return this.live(key) !== null;
  }

  private live(key: string): Expiring | null {
    const item = this.store.get(key);
    if (!item) return null;
    if (item.expiresAt <= this.now()) {
      this.store.delete(key);
      return null;
    }
    return item;
  }
}
