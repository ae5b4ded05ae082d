import { describe, it, expect, vi } from 'vitest';
import {
  InMemoryDeliveryLedger,
  PROCESSED_TTL_SECONDS,
  RedisDeliveryLedger,
  RETRY_TTL_SECONDS,
} from '../worker/delivery-ledger.js';

describe('InMemoryDeliveryLedger', () => {
  it('marks an idempotency key once', async () => {
    const ledger = new InMemoryDeliveryLedger();
    expect(await ledger.markProcessed('k1')).toBe(true);
    expect(await ledger.markProcessed('k1')).toBe(false);

    await ledger.releaseProcessed('k1');
    expect(await ledger.markProcessed('k1')).toBe(true);
  });

  it('expires markers after seven days', async () => {
    let now = 0;
    const ledger = new InMemoryDeliveryLedger(() => now);
    await ledger.markProcessed('k1');

    now = PROCESSED_TTL_SECONDS * 1000 - 1;
    expect(await ledger.markProcessed('k1')).toBe(false);
    now = PROCESSED_TTL_SECONDS * 1000;
    expect(await ledger.markProcessed('k1')).toBe(true);
  });

  it('counts retries per entry until cleared', async () => {
    const ledger = new InMemoryDeliveryLedger();
    expect(await ledger.incrementRetries('1-0')).toBe(1);
    expect(await ledger.incrementRetries('1-0')).toBe(2);
    expect(await ledger.incrementRetries('2-0')).toBe(1);

    await ledger.clearRetries('1-0');
    expect(ledger.has('retries:1-0')).toBe(false);
    expect(await ledger.incrementRetries('1-0')).toBe(1);
  });
});

describe('RedisDeliveryLedger', () => {
  type LedgerRedis = ConstructorParameters<typeof RedisDeliveryLedger>[0];

  type ExecReply = Array<[Error | null, unknown]> | null;

  function fakeRedis() {
    const tx = {
      incr: vi.fn((_key: string) => tx),
      expire: vi.fn((_key: string, _seconds: number) => tx),
      exec: vi.fn(async (): Promise<ExecReply> => [[null, 1], [null, 1]]),
    };
    return {
      tx,
      set: vi.fn(async (..._args: unknown[]): Promise<string | null> => 'OK'),
      del: vi.fn(async (_key: string) => 1),
      multi: vi.fn(() => tx),
    };
  }

  it('sets the marker with NX and a seven-day expiry', async () => {
    const redis = fakeRedis();
    const ledger = new RedisDeliveryLedger(redis as unknown as LedgerRedis);

    expect(await ledger.markProcessed('k1')).toBe(true);
    expect(redis.set).toHaveBeenCalledWith('processed:k1', '1', 'EX', PROCESSED_TTL_SECONDS, 'NX');

    redis.set.mockResolvedValueOnce(null);
    expect(await ledger.markProcessed('k1')).toBe(false);
  });

  it('increments retries and refreshes the one-day expiry in one transaction', async () => {
    const redis = fakeRedis();
    redis.tx.exec.mockResolvedValueOnce([[null, 3], [null, 1]]);
    const ledger = new RedisDeliveryLedger(redis as unknown as LedgerRedis);

    expect(await ledger.incrementRetries('9-0')).toBe(3);
    expect(redis.multi).toHaveBeenCalledTimes(1);
    expect(redis.tx.incr).toHaveBeenCalledWith('retries:9-0');
    expect(redis.tx.expire).toHaveBeenCalledWith('retries:9-0', RETRY_TTL_SECONDS);
    expect(redis.tx.exec).toHaveBeenCalledTimes(1);
  });

  it('surfaces a failed or aborted transaction', async () => {
    const redis = fakeRedis();
    const ledger = new RedisDeliveryLedger(redis as unknown as LedgerRedis);

    redis.tx.exec.mockResolvedValueOnce([[new Error('OOM command not allowed'), null], [null, 1]]);
    await expect(ledger.incrementRetries('9-0')).rejects.toThrow('OOM command not allowed');

    redis.tx.exec.mockResolvedValueOnce(null);
    await expect(ledger.incrementRetries('9-0')).rejects.toThrow('MULTI for retries:9-0 was aborted');
  });

  it('deletes markers and counters', async () => {
    const redis = fakeRedis();
    const ledger = new RedisDeliveryLedger(redis as unknown as LedgerRedis);

    await ledger.releaseProcessed('k1');
    await ledger.clearRetries('9-0');

    expect(redis.del).toHaveBeenNthCalledWith(1, 'processed:k1');
    expect(redis.del).toHaveBeenNthCalledWith(2, 'retries:9-0');
  });
});
