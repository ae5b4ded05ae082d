import { describe, it, expect } from 'vitest';
import { DEFAULT_SEED, InvalidPayloadError, parseJobPayload } from '../worker/job-payload.js';

describe('parseJobPayload', () => {
  it('reads payloads, seed and idempotency key', () => {
    const parsed = parseJobPayload(JSON.stringify({
      job_payload: { job_id: 'job-1' },
      resume_payload: { file_text: 'Jane Doe' },
      seed: '7',
      idempotency_key: '  key-1 ',
    }));

    expect(parsed).toEqual({
      job_payload: { job_id: 'job-1' },
      resume_payload: { file_text: 'Jane Doe' },
      seed: 7,
      idempotency_key: 'key-1',
    });
  });

  it('defaults missing parts', () => {
    expect(parseJobPayload(undefined)).toEqual({
      job_payload: {},
      resume_payload: {},
      seed: DEFAULT_SEED,
      idempotency_key: null,
    });
    expect(parseJobPayload('{"job_payload":null,"idempotency_key":"  "}')).toEqual({
      job_payload: {},
      resume_payload: {},
      seed: 42,
      idempotency_key: null,
    });
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseJobPayload('{oops')).toThrow(InvalidPayloadError);
    expect(() => parseJobPayload('{oops')).toThrow(/^Payload is not valid JSON/);
  });

  it('rejects payloads of the wrong shape', () => {
    expect(() => parseJobPayload('[]')).toThrow(InvalidPayloadError);
    expect(() => parseJobPayload('{"job_payload":[1,2]}')).toThrow(/^Invalid job payload: job_payload/);
    expect(() => parseJobPayload('{"seed":1.5}')).toThrow(/seed/);
  });
});
