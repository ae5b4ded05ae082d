import type { HttpAdapterConfig } from '../../lib/config.js';
import { AdapterHttpError } from '../../lib/errors.js';
import { isJsonObject, toJsonObject, type JsonObject } from '../../lib/json.js';
import logger from '../../lib/logger.js';
import { withRetry } from '../../lib/retry.js';
import type { StageName, StageResult } from '../types.js';
import type { StageAdapter } from './types.js';

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Calls a remote inference service: POST `{ stage, input, seed }`, expecting
 * a JSON object back. Every failure is retried with exponential backoff
 * until `retries` extra attempts are spent.
 */
export class HttpStageAdapter implements StageAdapter {
  readonly name = 'http';
  private readonly url: string;

  constructor(
    private readonly config: HttpAdapterConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.url = config.url;
  }

  runStage(stage: StageName, input: JsonObject, seed: number): Promise<StageResult> {
    return withRetry(() => this.postOnce(stage, input, seed), {
      maxAttempts: this.config.retries + 1,
      baseDelay: this.config.backoffMs,
      multiplier: this.config.backoffMultiplier,
      retryOn: () => true,
      onRetry: (attempt, error) => {
        logger.warn({ stage, attempt, err: error.message }, 'Stage adapter request failed, retrying');
      },
    });
  }

  private async postOnce(stage: StageName, input: JsonObject, seed: number): Promise<StageResult> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify({ stage, input, seed }),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new AdapterHttpError(
        `Stage service error ${response.status}: ${errText.slice(0, 200)}`,
        response.status,
      );
    }

    const data: unknown = await response.json();
    if (!isJsonObject(data)) {
      throw new AdapterHttpError('Stage service returned a non-object body', response.status);
    }
    return toJsonObject(data);
  }
}
