import { createHash } from 'node:crypto';
import { canonicalJson, type JsonObject } from '../lib/json.js';
import type { StageName } from './types.js';

export const CACHE_NAMESPACE = 'pipeline';

/**
 * Deterministic cache key for one stage invocation:
 * `pipeline:{stage}:{sha256(stage|seed|canonical payload)}`.
 */
export function stageCacheKey(stage: StageName, payload: JsonObject, seed: number): string {
  const material = `${stage}|${seed}|${canonicalJson(payload)}`;
  const digest = createHash('sha256').update(material, 'utf8').digest('hex');
  return `${CACHE_NAMESPACE}:${stage}:${digest}`;
}
