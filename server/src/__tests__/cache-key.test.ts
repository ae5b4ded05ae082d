import { describe, it, expect } from 'vitest';
import { canonicalJson, toJsonObject } from '../lib/json.js';
import { stageCacheKey } from '../pipeline/cache-key.js';

describe('canonicalJson', () => {
  it('sorts keys at every depth and drops whitespace', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: true, y: null }], c: 'x' } }))
      .toBe('{"a":{"c":"x","d":[2,{"y":null,"z":true}]},"b":1}');
  });

  it('keeps array order', () => {
    expect(canonicalJson([3, 1, 2])).toBe('[3,1,2]');
  });
});

describe('toJsonObject', () => {
  it('drops undefined and non-finite values', () => {
    expect(toJsonObject({ a: undefined, b: Number.NaN, c: [1, undefined], d: 'ok' }))
      .toEqual({ b: null, c: [1, null], d: 'ok' });
  });
});

describe('stageCacheKey', () => {
  it('is independent of key insertion order', () => {
    const a = stageCacheKey('A_JD_NORMALIZER', { content: 'x', config: { infer_ats: true, locale: 'en' } }, 42);
    const b = stageCacheKey('A_JD_NORMALIZER', { config: { locale: 'en', infer_ats: true }, content: 'x' }, 42);
    expect(a).toBe(b);
  });

  it('is namespaced by stage with a sha256 digest', () => {
    const key = stageCacheKey('D_MATCHER_SCORER', { jd: {} }, 7);
    expect(key).toMatch(/^pipeline:D_MATCHER_SCORER:[0-9a-f]{64}$/);
  });

  it('changes with the seed and the stage', () => {
    const payload = { content: 'same' };
    const base = stageCacheKey('A_JD_NORMALIZER', payload, 1);
    expect(stageCacheKey('A_JD_NORMALIZER', payload, 2)).not.toBe(base);
    expect(stageCacheKey('B_JD_EXTRACT', payload, 1).split(':')[2])
      .not.toBe(base.split(':')[2]);
  });
});
