import { describe, it, expect, vi } from 'vitest';
import { backoffDelayMs, isTransient, retryAfterMs, withRetry } from '../lib/retry.js';

describe('withRetry', () => {
  it('retries transient HTTP status errors', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 3) {
        const err = new Error('temporary outage') as Error & { status?: number };
        err.status = 503;
        throw err;
      }
      return 'ok';
    }, { maxAttempts: 3, baseDelay: 1 });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('retries transient network error codes', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 2) {
        const err = new Error('socket closed') as Error & { code?: string };
        err.code = 'ECONNRESET';
        throw err;
      }
      return 42;
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe(42);
    expect(attempts).toBe(2);
  });

  it('uses Retry-After header from response metadata', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts === 1) {
        const err = new Error('rate limited') as Error & {
          response?: { status: number; headers: Headers };
        };
        err.response = {
          status: 429,
          headers: new Headers([['retry-after', '0.001']]),
        };
        throw err;
      }
      return 'done';
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe('done');
    expect(attempts).toBe(2);
  });

  it('does not retry non-transient errors', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error('validation failed');
    }, { maxAttempts: 3, baseDelay: 1 })).rejects.toThrow('validation failed');
    expect(attempts).toBe(1);
  });

  it('does not retry aborted calls', async () => {
    const onRetry = vi.fn();
    let attempts = 0;
    const abortError = new Error('The operation was aborted');
    abortError.name = 'AbortError';

    await expect(withRetry(async () => {
      attempts += 1;
      throw abortError;
    }, { maxAttempts: 3, baseDelay: 1, onRetry })).rejects.toThrow('The operation was aborted');

    expect(attempts).toBe(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('retries any error a custom retryOn accepts', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 3) throw new Error('validation failed');
      return 'ok';
    }, { maxAttempts: 3, baseDelay: 1, retryOn: () => true });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('reports each retry with its attempt number', async () => {
    const onRetry = vi.fn();
    await expect(withRetry(async () => {
      throw new Error('service unavailable');
    }, { maxAttempts: 3, baseDelay: 1, onRetry })).rejects.toThrow('service unavailable');

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(Error));
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(Error));
  });

  it('grows the backoff delay by the multiplier', async () => {
    vi.useFakeTimers();
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    const timeout = vi.spyOn(globalThis, 'setTimeout');
    try {
      let attempts = 0;
      const pending = withRetry(async () => {
        attempts += 1;
        if (attempts < 3) throw new Error('bad gateway');
        return 'ok';
      }, { maxAttempts: 3, baseDelay: 100, multiplier: 3 });

      await vi.runAllTimersAsync();

      await expect(pending).resolves.toBe('ok');
      const delays = timeout.mock.calls.map((call) => call[1]);
      expect(delays).toEqual([100, 300]);
    } finally {
      timeout.mockRestore();
      vi.restoreAllMocks();
      vi.useRealTimers();
    }
  });
});

describe('isTransient', () => {
  it('classifies by status before message', () => {
    const notFound = Object.assign(new Error('upstream 503 in body'), { status: 404 });
    expect(isTransient(notFound)).toBe(false);
    expect(isTransient(Object.assign(new Error('x'), { statusCode: 502 }))).toBe(true);
  });

  it('recognises timeouts and network failures by message', () => {
    expect(isTransient(new Error('The operation was aborted due to timeout'))).toBe(true);
    expect(isTransient(new Error('fetch failed'))).toBe(true);
    expect(isTransient(new Error('Request failed with status 429'))).toBe(true);
    expect(isTransient(new Error('invalid stage name'))).toBe(false);
  });
});

describe('backoff', () => {
  it('scales the base delay by the multiplier per attempt', () => {
    expect(backoffDelayMs(1, 500, 2, () => 0.5)).toBe(500);
    expect(backoffDelayMs(2, 500, 2, () => 0.5)).toBe(1000);
    expect(backoffDelayMs(3, 500, 3, () => 0)).toBe(2250);
  });

  it('caps Retry-After at one minute', () => {
    expect(retryAfterMs({ headers: { 'Retry-After': '2' } })).toBe(2000);
    expect(retryAfterMs({ headers: { 'retry-after': '600' } })).toBe(60000);
    expect(retryAfterMs(new Error('no headers'))).toBe(0);
  });
});
