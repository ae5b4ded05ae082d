import type { Redis } from 'ioredis';
import { isJsonObject, toJsonValue, type JsonValue } from './json.js';

export const DEFAULT_CACHE_TTL_SECONDS = 60 * 60 * 24;

export type CacheResult<T> =
  | { success: true; value: T }
  | { success: false; error: Error };

/**
 * Key-value store for stage results. Every operation reports failure as a
 * value; callers log the failure and carry on without the cache.
 */
export interface StageCache {
  get(key: string): Promise<CacheResult<JsonValue | null>>;
  set(key: string, value: JsonValue, ttlSeconds?: number): Promise<CacheResult<void>>;
  delete(key: string): Promise<CacheResult<void>>;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

async function attempt<T>(fn: () => Promise<T>): Promise<CacheResult<T>> {
  try {
    return { success: true, value: await fn() };
  } catch (err) {
    return { success: false, error: toError(err) };
  }
}

export class RedisStageCache implements StageCache {
  constructor(
    private readonly redis: Pick<Redis, 'get' | 'set' | 'del'>,
    private readonly defaultTtlSeconds = DEFAULT_CACHE_TTL_SECONDS,
  ) {}

  get(key: string): Promise<CacheResult<JsonValue | null>> {
    return attempt(async () => {
      const raw = await this.redis.get(key);
      if (raw === null) return null;
      const parsed: unknown = JSON.parse(raw);
      // Older writers stored objects double-encoded as strings.
      if (typeof parsed === 'string') {
        try {
          const inner: unknown = JSON.parse(parsed);
          if (isJsonObject(inner)) return inner;
        } catch {
          return parsed;
        }
      }
      return toJsonValue(parsed);
    });
  }

  set(key: string, value: JsonValue, ttlSeconds = this.defaultTtlSeconds): Promise<CacheResult<void>> {
    return attempt(async () => {
      await this.redis.set(key, JSON.stringify(value), 'EX', ttlSeconds);
    });
  }

  delete(key: string): Promise<CacheResult<void>> {
    return attempt(async () => {
      await this.redis.del(key);
    });
  }
}

interface MemoryCacheEntry {
  json: string;
  expiresAt: number;
}

export class InMemoryStageCache implements StageCache {
  private readonly entries = new Map<string, MemoryCacheEntry>();

  constructor(
    private readonly defaultTtlSeconds = DEFAULT_CACHE_TTL_SECONDS,
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<CacheResult<JsonValue | null>> {
    const entry = this.entries.get(key);
    if (!entry) return { success: true, value: null };
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return { success: true, value: null };
    }
    // Stored as JSON text.
    return { success: true, value: toJsonValue(JSON.parse(entry.json)) };
  }

  async set(key: string, value: JsonValue, ttlSeconds = this.defaultTtlSeconds): Promise<CacheResult<void>> {
    this.entries.set(key, {
      json: JSON.stringify(value),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
    return { success: true, value: undefined };
  }

  async delete(key: string): Promise<CacheResult<void>> {
    this.entries.delete(key);
    return { success: true, value: undefined };
  }

  get size(): number {
    return this.entries.size;
  }
}
