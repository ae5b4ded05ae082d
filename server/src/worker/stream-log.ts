/**
 * Client-side view of a consumer-group log. One instance is bound to a
 * stream, a group and a dead-letter destination; the consumer identity is
 * passed per call so workers in one process can share an instance.
 */

export interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

export interface PendingEntry {
  id: string;
  consumer: string;
  idleMs: number;
  deliveries: number;
}

export interface DeadLetterEntry {
  original_id: string;
  /** JSON-encoded original payload. */
  payload: string;
  reason: string;
}

export interface StreamLog {
  /** Creates the group (and stream) if missing. An existing group is not an error. */
  ensureGroup(): Promise<void>;
  append(fields: Record<string, string>): Promise<string>;
  /** Blocks up to `blockMs` for entries never delivered to this group. */
  readNew(consumer: string, count: number, blockMs: number): Promise<StreamEntry[]>;
  /** Oldest `count` pending entries idle at least `minIdleMs`. */
  listPending(count: number, minIdleMs?: number): Promise<PendingEntry[]>;
  /** Takes ownership of entries idle at least `minIdleMs`; entries claimed meanwhile are skipped. */
  claim(consumer: string, minIdleMs: number, ids: string[]): Promise<StreamEntry[]>;
  ack(id: string): Promise<void>;
  remove(id: string): Promise<void>;
  deadLetter(entry: DeadLetterEntry): Promise<string>;
}

export const PAYLOAD_FIELD = 'payload';
export const IDEMPOTENCY_FIELD = 'idempotency_key';
