/**
 * Stream worker: one consumer loop in the assessment consumer group.
 *
 * Each iteration reclaims entries another consumer abandoned, then blocks for
 * new ones. An entry is acked only after the pipeline ran for it, after an
 * idempotent short-circuit, or after it was handed to the dead-letter
 * stream. Failed entries stay pending; the claim step picks them up again
 * once they have been idle long enough.
 */

import type { WorkerConfig } from '../lib/config.js';
import { ObjectFetchError } from '../lib/errors.js';
import type { JsonObject } from '../lib/json.js';
import { createConsumerLogger, type Logger } from '../lib/logger.js';
import type { ObjectStore } from '../lib/object-store.js';
import { captureError } from '../lib/sentry.js';
import { extractTextAuto } from '../lib/text-extract.js';
import type { WorkerMetrics } from '../lib/worker-metrics.js';
import { isStageError, STAGE_NAMES, type PipelineResult } from '../pipeline/types.js';
import type { DeliveryLedger } from './delivery-ledger.js';
import { parseJobPayload } from './job-payload.js';
import { IDEMPOTENCY_FIELD, PAYLOAD_FIELD, type StreamEntry, type StreamLog } from './stream-log.js';

/** Brief pause after an empty read so a non-blocking backend does not hot-loop. */
const EMPTY_READ_YIELD_MS = 50;

export interface PipelineRunner {
  run(jobPayload: JsonObject, resumePayload: JsonObject, seed: number): Promise<PipelineResult>;
}

export type WorkerSettings = Pick<
  WorkerConfig,
  | 'maxRetries'
  | 'claimIdleMs'
  | 'readBlockMs'
  | 'readCount'
  | 'pendingScanCount'
  | 'loopErrorBackoffMs'
  | 'storageBucket'
>;

export interface StreamWorkerDeps {
  consumerName: string;
  log: StreamLog;
  ledger: DeliveryLedger;
  pipeline: PipelineRunner;
  /** Required only when entries reference a `storage_key`. */
  objectStore: ObjectStore | null;
  settings: WorkerSettings;
  metrics?: WorkerMetrics;
  logger?: Logger;
  reportError?: (err: unknown, context?: Record<string, unknown>) => void;
}

export type ProcessOutcome =
  | { status: 'succeeded'; result: PipelineResult }
  | { status: 'duplicate' }
  | { status: 'failed'; error: Error };

export interface IterationSummary {
  claimed: number;
  read: number;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Dead-letter payloads keep the original text when it parses, else wrap it. */
function deadLetterPayload(raw: string | undefined): string {
  if (!raw) return '{}';
  try {
    JSON.parse(raw);
    return raw;
  } catch {
    return JSON.stringify({ _raw: raw });
  }
}

export class StreamWorker {
  readonly consumerName: string;
  private readonly log: StreamLog;
  private readonly ledger: DeliveryLedger;
  private readonly pipeline: PipelineRunner;
  private readonly objectStore: ObjectStore | null;
  private readonly settings: WorkerSettings;
  private readonly metrics: WorkerMetrics | null;
  private readonly logger: Logger;
  private readonly reportError: (err: unknown, context?: Record<string, unknown>) => void;

  constructor(deps: StreamWorkerDeps) {
    this.consumerName = deps.consumerName;
    this.log = deps.log;
    this.ledger = deps.ledger;
    this.pipeline = deps.pipeline;
    this.objectStore = deps.objectStore;
    this.settings = deps.settings;
    this.metrics = deps.metrics ?? null;
    this.logger = deps.logger ?? createConsumerLogger(deps.consumerName);
    this.reportError = deps.reportError ?? captureError;
  }

  /** Ensures the consumer group exists. */
  async start(): Promise<void> {
    await this.log.ensureGroup();
    this.logger.info('Stream worker ready');
  }

  /**
   * Runs iterations until `signal` aborts. Cancellation takes effect between
   * entries; an entry that has started is always finished and booked. Group
   * creation is retried with the same backoff as any other loop error.
   */
  async run(signal: AbortSignal): Promise<void> {
    let ready = false;

    while (!signal.aborted) {
      try {
        if (!ready) {
          await this.start();
          ready = true;
        }
        const summary = await this.runIteration(signal);
        if (summary.claimed === 0 && summary.read === 0) {
          await sleep(EMPTY_READ_YIELD_MS, signal);
        }
      } catch (err) {
        this.metrics?.recordLoopError();
        this.logger.error({ err }, 'Worker loop error, backing off');
        this.reportError(err, { consumer: this.consumerName, phase: 'loop' });
        await sleep(this.settings.loopErrorBackoffMs, signal);
      }
    }

    this.logger.info('Stream worker stopped');
  }

  async runIteration(signal?: AbortSignal): Promise<IterationSummary> {
    const claimed = await this.claimStale(signal);
    if (signal?.aborted) return { claimed, read: 0 };

    const entries = await this.log.readNew(this.consumerName, this.settings.readCount, this.settings.readBlockMs);
    let read = 0;
    for (const entry of entries) {
      if (signal?.aborted) break;
      await this.handleEntry(entry, false);
      read += 1;
    }
    return { claimed, read };
  }

  /**
   * Claims pending entries idle for at least `claimIdleMs` and processes them
   * at once. Claim errors are logged and reported; the iteration still reads.
   */
  private async claimStale(signal?: AbortSignal): Promise<number> {
    let handled = 0;
    try {
      const stale = await this.log.listPending(this.settings.pendingScanCount, this.settings.claimIdleMs);

      for (const candidate of stale) {
        if (signal?.aborted) break;
        const claimed = await this.log.claim(this.consumerName, this.settings.claimIdleMs, [candidate.id]);
        for (const entry of claimed) {
          this.logger.info(
            { entryId: entry.id, previousConsumer: candidate.consumer, idleMs: candidate.idleMs },
            'Claimed stale entry',
          );
          await this.handleEntry(entry, true);
          handled += 1;
        }
      }
    } catch (err) {
      this.logger.error({ err }, 'Error while claiming pending entries');
      this.reportError(err, { consumer: this.consumerName, phase: 'claim' });
    }
    return handled;
  }

  private async handleEntry(entry: StreamEntry, reclaimed: boolean): Promise<void> {
    const entryLog = this.logger.child({ entryId: entry.id });
    this.metrics?.recordReceived(reclaimed);
    const startedAt = Date.now();

    const outcome = await this.processEntry(entry, entryLog);
    const latencyMs = Date.now() - startedAt;

    if (outcome.status !== 'failed') {
      await this.settle(entry.id);
      this.metrics?.recordOutcome(outcome.status, latencyMs);
      return;
    }

    const retries = await this.ledger.incrementRetries(entry.id);
    entryLog.warn(
      { err: outcome.error.message, retries, maxRetries: this.settings.maxRetries },
      'Entry failed processing',
    );

    if (retries < this.settings.maxRetries) {
      this.metrics?.recordOutcome('failed', latencyMs);
      return;
    }

    const reason = `exceeded ${this.settings.maxRetries} retries`;
    await this.log.deadLetter({
      original_id: entry.id,
      payload: deadLetterPayload(entry.fields[PAYLOAD_FIELD]),
      reason,
    });
    await this.settle(entry.id);
    this.metrics?.recordOutcome('dead_lettered', latencyMs);
    entryLog.error({ reason }, 'Entry moved to dead-letter stream');
  }

  /** Ack, delete and drop the retry counter. */
  private async settle(entryId: string): Promise<void> {
    await this.log.ack(entryId);
    await this.log.remove(entryId);
    await this.ledger.clearRetries(entryId);
  }

  /**
   * Parses, deduplicates, enriches and runs one entry. Never throws: any
   * failure is returned so the caller can do retry bookkeeping. Stage errors
   * inside the pipeline are part of a successful result.
   */
  async processEntry(entry: StreamEntry, entryLog: Logger = this.logger.child({ entryId: entry.id })): Promise<ProcessOutcome> {
    let idempotencyKey: string | null = null;
    let marked = false;

    try {
      const payload = parseJobPayload(entry.fields[PAYLOAD_FIELD]);
      idempotencyKey = entry.fields[IDEMPOTENCY_FIELD]?.trim() || payload.idempotency_key;

      if (idempotencyKey) {
        marked = await this.ledger.markProcessed(idempotencyKey);
        if (!marked) {
          entryLog.info({ idempotencyKey }, 'Skipping already processed idempotency key');
          return { status: 'duplicate' };
        }
      }

      const resumePayload = await this.enrichResume(payload.resume_payload, entryLog);
      const result = await this.pipeline.run(payload.job_payload, resumePayload, payload.seed);

      const stageErrors = STAGE_NAMES.filter((name) => isStageError(result.stages[name])).length;
      if (stageErrors > 0) this.metrics?.recordStageErrors(stageErrors);

      entryLog.info(
        { pipelineId: result.id, assessmentId: result.assessment_id, finalScore: result.final_score, stageErrors },
        'Entry processed',
      );
      return { status: 'succeeded', result };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      entryLog.error({ err: error }, 'Entry processing failed');

      // Release the marker so a redelivery actually reprocesses the entry.
      if (marked && idempotencyKey) {
        await this.releaseMarker(idempotencyKey, entryLog);
      }
      return { status: 'failed', error };
    }
  }

  private async releaseMarker(idempotencyKey: string, entryLog: Logger): Promise<void> {
    try {
      await this.ledger.releaseProcessed(idempotencyKey);
    } catch (err) {
      entryLog.warn({ err, idempotencyKey }, 'Failed to release idempotency marker');
      this.reportError(err, { consumer: this.consumerName, idempotencyKey });
    }
  }

  /**
   * Fetches `storage_key` bytes and replaces them with extracted text.
   * Payloads carrying `file_text` inline pass through untouched.
   */
  private async enrichResume(resume: JsonObject, entryLog: Logger): Promise<JsonObject> {
    const storageKey = resume.storage_key;
    if (typeof storageKey !== 'string' || storageKey.length === 0) {
      if (typeof resume.file_text !== 'string' || resume.file_text.length === 0) {
        entryLog.debug('No storage_key or file_text; pipeline runs with an empty resume');
      }
      return resume;
    }

    const bucket = this.settings.storageBucket;
    if (!bucket || !this.objectStore) {
      throw new Error('storage_key present but STORAGE_BUCKET or object storage is not configured');
    }

    entryLog.info({ bucket, storageKey }, 'Fetching resume object');
    const bytes = await this.objectStore.getObjectBytes(bucket, storageKey);
    if (bytes.length === 0) {
      throw new ObjectFetchError(`Empty object ${bucket}/${storageKey}`, bucket, storageKey);
    }

    const { text, kind } = await extractTextAuto(bytes);
    entryLog.debug({ kind, chars: text.length }, 'Extracted resume text');
    return { ...resume, file_text: text, file_type: kind };
  }
}
