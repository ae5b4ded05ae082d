import type { JsonObject } from '../lib/json.js';
import { IDEMPOTENCY_FIELD, PAYLOAD_FIELD, type StreamLog } from './stream-log.js';

/**
 * Appends an assessment job to the stream. Returns the entry id.
 *
 * Entries carrying the same non-empty `idempotencyKey` run the pipeline at
 * most once while the worker's processed marker is alive.
 */
export async function enqueueAssessmentJob(
  log: StreamLog,
  payload: JsonObject,
  idempotencyKey?: string,
): Promise<string> {
  return log.append({
    [PAYLOAD_FIELD]: JSON.stringify(payload),
    [IDEMPOTENCY_FIELD]: idempotencyKey ?? '',
  });
}
