import { z } from 'zod';
import { errorMessage } from '../lib/errors.js';
import { toJsonObject, type JsonObject } from '../lib/json.js';
import { formatIssues, validate } from '../lib/validate.js';

export const DEFAULT_SEED = 42;

const JobPayloadSchema = z.object({
  job_payload: z.record(z.unknown()).nullish(),
  resume_payload: z.record(z.unknown()).nullish(),
  seed: z.coerce.number().int().optional(),
  idempotency_key: z.string().optional(),
}).passthrough();

export interface JobPayload {
  job_payload: JsonObject;
  resume_payload: JsonObject;
  seed: number;
  /** Fallback when the entry's own `idempotency_key` field is empty. */
  idempotency_key: string | null;
}

export class InvalidPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPayloadError';
  }
}

/** Parses the `payload` field of a stream entry. */
export function parseJobPayload(raw: string | undefined): JobPayload {
  let decoded: unknown = {};
  if (raw) {
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      throw new InvalidPayloadError(`Payload is not valid JSON: ${errorMessage(err)}`);
    }
  }

  const result = validate(JobPayloadSchema, decoded);
  if (!result.success) {
    throw new InvalidPayloadError(`Invalid job payload: ${formatIssues(result.issues)}`);
  }

  const key = result.data.idempotency_key?.trim();
  return {
    job_payload: toJsonObject(result.data.job_payload ?? {}),
    resume_payload: toJsonObject(result.data.resume_payload ?? {}),
    seed: result.data.seed ?? DEFAULT_SEED,
    idempotency_key: key ? key : null,
  };
}
