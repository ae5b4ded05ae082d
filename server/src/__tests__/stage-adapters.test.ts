import { describe, it, expect, vi } from 'vitest';
import type { HttpAdapterConfig } from '../lib/config.js';
import { AdapterHttpError, ConfigError } from '../lib/errors.js';
import { HttpStageAdapter } from '../pipeline/adapters/http-adapter.js';
import { LocalStageAdapter } from '../pipeline/adapters/local-adapter.js';
import { createStageAdapter, StageAdapterFacade } from '../pipeline/adapters/registry.js';
import type { StageAdapter } from '../pipeline/adapters/types.js';

const HTTP_CONFIG: HttpAdapterConfig = {
  url: 'http://stage-service.test/run',
  apiKey: 'test-secret',
  timeoutMs: 1_000,
  retries: 2,
  backoffMs: 1,
  backoffMultiplier: 2,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('LocalStageAdapter', () => {
  const adapter = new LocalStageAdapter();

  it('returns identical output for identical input and seed', async () => {
    const input = { content: 'Senior engineer, Kubernetes', company: 'Initech', config: { infer_ats: true } };
    const first = await adapter.runStage('A_JD_NORMALIZER', input, 42);
    const second = await adapter.runStage('A_JD_NORMALIZER', { config: { infer_ats: true }, company: 'Initech', content: 'Senior engineer, Kubernetes' }, 42);
    expect(second).toEqual(first);
    expect(first.company).toBe('Initech');
    expect(first.cleaned_text).toBe('Senior engineer, Kubernetes');
  });

  it('extracts distinct tokens in first-seen order', async () => {
    const out = await adapter.runStage('B_JD_EXTRACT', { cleaned_text: 'Data Analyst - SQL, Power BI reporting SQL' }, 1);
    expect(out.must_have_skills).toEqual(['Data', 'Analyst', 'SQL']);
    expect(out.nice_to_have_skills).toEqual(['Power', 'reporting']);
    expect(out.tools).toEqual([]);
    expect(out.role_title).toBe('Unknown');
  });

  it('scores skill overlap between jd and resume', async () => {
    const out = await adapter.runStage('D_MATCHER_SCORER', {
      jd: { must_have_skills: ['SQL', 'Python'] },
      resume: { skills: ['SQL', 'Excel'] },
      config: {},
    }, 3);

    expect(out.matching_summary).toEqual({ must_have_match_pct: 50 });
    expect(out.matches).toEqual([
      { term: 'SQL', found: true, match_type: 'exact' },
      { term: 'Python', found: false, match_type: 'exact' },
    ]);
    expect(out.misses).toEqual([{ term: 'Python', reason: 'not found' }]);
    expect(typeof out.score).toBe('number');
    expect(out.score).toBeGreaterThanOrEqual(50);
    expect(out.score).toBeLessThanOrEqual(75);
  });

  it('recommends the top must-have skills', async () => {
    const out = await adapter.runStage('E_RECOMMEND', { jd: { must_have_skills: ['SQL', 'dbt', 'Airflow', 'Spark'] } }, 5);
    expect(out.recommendation_list).toEqual([
      { level: 'High', action: "Add 'SQL' to Skills section", impact: 5 },
      { level: 'High', action: "Add 'dbt' to Skills section", impact: 5 },
      { level: 'High', action: "Add 'Airflow' to Skills section", impact: 5 },
    ]);
  });
});

describe('HttpStageAdapter', () => {
  it('posts stage, input and seed with a bearer token', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({ score: 80, confidence: 0.9 }));
    const adapter = new HttpStageAdapter(HTTP_CONFIG, fetchMock);

    const out = await adapter.runStage('D_MATCHER_SCORER', { jd: {} }, 7);

    expect(out).toEqual({ score: 80, confidence: 0.9 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://stage-service.test/run');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(init.body).toBe('{"stage":"D_MATCHER_SCORER","input":{"jd":{}},"seed":7}');
  });

  it('retries failed requests until one succeeds', async () => {
    let calls = 0;
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => {
      calls += 1;
      return calls === 1 ? jsonResponse({ error: 'busy' }, 503) : jsonResponse({ ok: true });
    });
    const adapter = new HttpStageAdapter(HTTP_CONFIG, fetchMock);

    await expect(adapter.runStage('A_JD_NORMALIZER', {}, 1)).resolves.toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured number of retries', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response('boom', { status: 500 }));
    const adapter = new HttpStageAdapter(HTTP_CONFIG, fetchMock);

    const err = await adapter.runStage('A_JD_NORMALIZER', {}, 1).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AdapterHttpError);
    expect(err instanceof AdapterHttpError && err.status).toBe(500);
    expect(err instanceof Error && err.message).toBe('Stage service error 500: boom');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('rejects bodies that are not JSON objects', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse([1, 2, 3]));
    const adapter = new HttpStageAdapter({ ...HTTP_CONFIG, retries: 0 }, fetchMock);

    await expect(adapter.runStage('A_JD_NORMALIZER', {}, 1))
      .rejects.toThrow('Stage service returned a non-object body');
  });
});

describe('StageAdapterFacade', () => {
  const failing: StageAdapter = {
    name: 'http',
    runStage: vi.fn(async () => {
      throw new Error('service down');
    }),
  };

  it('replays the call on the fallback when the primary throws', async () => {
    const fallback = new LocalStageAdapter();
    const facade = new StageAdapterFacade(failing, fallback);

    const out = await facade.runStage('F_LATEX_ADAPT', { template: 'onepage' }, 9);

    expect(out).toEqual(await fallback.runStage('F_LATEX_ADAPT', { template: 'onepage' }, 9));
    expect(facade.name).toBe('http+local');
  });

  it('propagates the error without a fallback', async () => {
    const facade = new StageAdapterFacade(failing, null);
    await expect(facade.runStage('A_JD_NORMALIZER', {}, 1)).rejects.toThrow('service down');
  });
});

describe('createStageAdapter', () => {
  it('uses the local adapter alone when it is the primary', () => {
    const adapter = createStageAdapter({ kind: 'local', fallback: true, http: null });
    expect(adapter.name).toBe('local');
  });

  it('pairs the http adapter with a local fallback', () => {
    const adapter = createStageAdapter({ kind: 'http', fallback: true, http: HTTP_CONFIG });
    expect(adapter.name).toBe('http+local');
  });

  it('omits the fallback when disabled', () => {
    const adapter = createStageAdapter({ kind: 'http', fallback: false, http: HTTP_CONFIG });
    expect(adapter.name).toBe('http');
  });

  it('rejects http without a service url', () => {
    expect(() => createStageAdapter({ kind: 'http', fallback: true, http: null })).toThrow(ConfigError);
  });
});
