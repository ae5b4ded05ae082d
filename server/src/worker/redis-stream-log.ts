import type { Redis } from 'ioredis';
import { errorMessage } from '../lib/errors.js';
import logger from '../lib/logger.js';
import type { DeadLetterEntry, PendingEntry, StreamEntry, StreamLog } from './stream-log.js';

export interface RedisStreamLogOptions {
  streamKey: string;
  group: string;
  dlqKey: string;
}

// ─── Reply parsing ────────────────────────────────────────────────────
//
// ioredis types stream replies as `unknown[]`; these helpers narrow the
// nested arrays Redis actually returns.

function fieldsFromFlat(raw: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (!Array.isArray(raw)) return fields;
  for (let i = 0; i + 1 < raw.length; i += 2) {
    const key: unknown = raw[i];
    const value: unknown = raw[i + 1];
    if (typeof key === 'string' && typeof value === 'string') {
      fields[key] = value;
    }
  }
  return fields;
}

/** `[[id, [field, value, ...]], ...]`; entries deleted while pending come back with null fields. */
export function parseEntries(raw: unknown): StreamEntry[] {
  if (!Array.isArray(raw)) return [];
  const entries: StreamEntry[] = [];
  for (const item of raw) {
    if (!Array.isArray(item) || typeof item[0] !== 'string') continue;
    entries.push({ id: item[0], fields: fieldsFromFlat(item[1]) });
  }
  return entries;
}

/** XREADGROUP reply: `[[streamKey, entries], ...]` or null on timeout. */
export function parseReadReply(raw: unknown): StreamEntry[] {
  if (!Array.isArray(raw)) return [];
  return raw.flatMap((stream: unknown) => (Array.isArray(stream) ? parseEntries(stream[1]) : []));
}

/** Extended XPENDING reply: `[[id, consumer, idleMs, deliveries], ...]`. */
export function parsePendingReply(raw: unknown): PendingEntry[] {
  if (!Array.isArray(raw)) return [];
  const pending: PendingEntry[] = [];
  for (const item of raw) {
    if (!Array.isArray(item) || typeof item[0] !== 'string') continue;
    pending.push({
      id: item[0],
      consumer: String(item[1] ?? ''),
      idleMs: Number(item[2] ?? 0),
      deliveries: Number(item[3] ?? 0),
    });
  }
  return pending;
}

/**
 * Redis Streams implementation of the consumer-group log.
 *
 * Blocking reads hold the connection for up to `blockMs`, so each consumer
 * loop should own its own client.
 */
export class RedisStreamLog implements StreamLog {
  private readonly streamKey: string;
  private readonly group: string;
  private readonly dlqKey: string;

  constructor(
    private readonly redis: Redis,
    options: RedisStreamLogOptions,
  ) {
    this.streamKey = options.streamKey;
    this.group = options.group;
    this.dlqKey = options.dlqKey;
  }

  async ensureGroup(): Promise<void> {
    try {
      // '$' only delivers entries appended after the group is created.
      await this.redis.xgroup('CREATE', this.streamKey, this.group, '$', 'MKSTREAM');
      logger.info({ stream: this.streamKey, group: this.group }, 'Consumer group created');
    } catch (err) {
      // BUSYGROUP: the group already exists.
      if (errorMessage(err).toUpperCase().includes('BUSYGROUP')) return;
      throw err;
    }
  }

  async append(fields: Record<string, string>): Promise<string> {
    const flat = Object.entries(fields).flat();
    const id = await this.redis.xadd(this.streamKey, '*', ...flat);
    if (!id) throw new Error(`XADD to ${this.streamKey} returned no id`);
    return id;
  }

  async readNew(consumer: string, count: number, blockMs: number): Promise<StreamEntry[]> {
    // '>' = entries never delivered to any consumer in this group.
    const reply: unknown = await this.redis.xreadgroup(
      'GROUP', this.group, consumer,
      'COUNT', count,
      'BLOCK', blockMs,
      'STREAMS', this.streamKey,
      '>',
    );
    return parseReadReply(reply);
  }

  async listPending(count: number, minIdleMs = 0): Promise<PendingEntry[]> {
    const reply: unknown = await this.redis.xpending(this.streamKey, this.group, 'IDLE', minIdleMs, '-', '+', count);
    return parsePendingReply(reply);
  }

  async claim(consumer: string, minIdleMs: number, ids: string[]): Promise<StreamEntry[]> {
    if (ids.length === 0) return [];
    const reply: unknown = await this.redis.xclaim(this.streamKey, this.group, consumer, minIdleMs, ...ids);
    return parseEntries(reply);
  }

  async ack(id: string): Promise<void> {
    await this.redis.xack(this.streamKey, this.group, id);
  }

  async remove(id: string): Promise<void> {
    await this.redis.xdel(this.streamKey, id);
  }

  async deadLetter(entry: DeadLetterEntry): Promise<string> {
    const id = await this.redis.xadd(
      this.dlqKey,
      '*',
      'original_id', entry.original_id,
      'payload', entry.payload,
      'reason', entry.reason,
    );
    if (!id) throw new Error(`XADD to ${this.dlqKey} returned no id`);
    return id;
  }
}
