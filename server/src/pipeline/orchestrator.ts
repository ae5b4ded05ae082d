import { randomUUID } from 'node:crypto';
import type { AssessmentRepository } from '../lib/assessment-repository.js';
import { errorMessage } from '../lib/errors.js';
import { isJsonObject, toJsonObject, type JsonObject, type JsonValue } from '../lib/json.js';
import logger, { type Logger } from '../lib/logger.js';
import { DEFAULT_CACHE_TTL_SECONDS, type StageCache } from '../lib/stage-cache.js';
import type { StageAdapter } from './adapters/types.js';
import { stageCacheKey } from './cache-key.js';
import { parseResumeText } from './resume-parser.js';
import {
  STAGES,
  stageError,
  type PipelineResult,
  type StageName,
  type StageResult,
  type StageResults,
} from './types.js';

const DEFAULT_PARSER_CONFIDENCE = 0.8;

export interface OrchestratorDeps {
  adapter: StageAdapter;
  cache: StageCache;
  repository: AssessmentRepository;
  cacheTtlSeconds?: number;
  logger?: Logger;
  /** Year used by the resume parser for open-ended date ranges. */
  currentYear?: () => number;
}

function field(source: JsonObject | undefined, key: string): JsonValue | undefined {
  return source ? source[key] : undefined;
}

function text(value: JsonValue | undefined): string | null {
  return typeof value === 'string' ? value : null;
}

function objectOr(value: JsonValue | undefined, fallback: JsonObject): JsonObject {
  return isJsonObject(value) ? value : fallback;
}

function firstCandidateName(candidates: JsonValue | undefined): string | null {
  if (!Array.isArray(candidates) || candidates.length === 0) return null;
  const first = candidates[0];
  return isJsonObject(first) ? text(first.name) : null;
}

/**
 * Runs the six analysis stages for one job in a fixed order. Each stage is
 * looked up in the cache first; a stage that throws is recorded as an error
 * result and the run continues with it as input.
 */
export class PipelineOrchestrator {
  private readonly adapter: StageAdapter;
  private readonly cache: StageCache;
  private readonly repository: AssessmentRepository;
  private readonly ttlSeconds: number;
  private readonly log: Logger;
  private readonly currentYear: () => number;

  constructor(deps: OrchestratorDeps) {
    this.adapter = deps.adapter;
    this.cache = deps.cache;
    this.repository = deps.repository;
    this.ttlSeconds = deps.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.log = deps.logger ?? logger.child({ component: 'pipeline' });
    this.currentYear = deps.currentYear ?? (() => new Date().getUTCFullYear());
  }

  async run(jobPayload: JsonObject, resumePayload: JsonObject, seed: number): Promise<PipelineResult> {
    const results: StageResults = {};

    for (const { name } of STAGES) {
      let out: StageResult;
      try {
        out = await this.executeStage(name, jobPayload, resumePayload, results, seed);
      } catch (err) {
        this.log.error({ err, stage: name }, 'Unhandled error in pipeline stage');
        out = stageError(errorMessage(err));
      }
      results[name] = out;
    }

    const rawScore = field(results.D_MATCHER_SCORER, 'score');
    const finalScore = typeof rawScore === 'number' && Number.isFinite(rawScore) ? rawScore : 0;

    const final: PipelineResult = {
      id: randomUUID(),
      created_at: new Date().toISOString(),
      stages: results,
      final_score: finalScore,
      job_id: text(jobPayload.job_id),
      resume_id: text(resumePayload.resume_id),
      meta: {
        seed,
        job_source: text(jobPayload.source_url),
        company: text(jobPayload.company),
        role_title: text(field(results.B_JD_EXTRACT, 'role_title')),
      },
      assessment_id: null,
    };

    final.assessment_id = await this.persist(final, jobPayload, resumePayload);
    return final;
  }

  private executeStage(
    stage: StageName,
    job: JsonObject,
    resume: JsonObject,
    results: StageResults,
    seed: number,
  ): Promise<StageResult> {
    switch (stage) {
      case 'A_JD_NORMALIZER':
        return this.runCached(stage, {
          content: text(job.raw_text) || text(job.content) || '',
          source_url: job.source_url ?? null,
          company: job.company ?? null,
          config: objectOr(job.config, { infer_ats: true }),
        }, seed);

      case 'B_JD_EXTRACT': {
        const a = results.A_JD_NORMALIZER;
        const candidates = field(a, 'ats_candidates');
        return this.runCached(stage, {
          cleaned_text: field(a, 'cleaned_text') ?? text(job.raw_text) ?? '',
          ats_candidates: candidates ?? [],
          config: {
            platform: firstCandidateName(candidates),
            prioritize_ats_keywords: true,
          },
        }, seed);
      }

      case 'C_RESUME_PARSE':
        return this.parseResume(resume, seed);

      case 'D_MATCHER_SCORER':
        return this.runCached(stage, {
          jd: results.B_JD_EXTRACT ?? {},
          resume: results.C_RESUME_PARSE ?? {},
          config: objectOr(job.scoring_config, {}),
        }, seed);

      case 'E_RECOMMEND':
        return this.runCached(stage, {
          score: field(results.D_MATCHER_SCORER, 'score') ?? null,
          jd: results.B_JD_EXTRACT ?? {},
          resume: results.C_RESUME_PARSE ?? {},
          config: objectOr(job.recommend_config, {}),
        }, seed);

      case 'F_LATEX_ADAPT':
        return this.runCached(stage, {
          recommendation: results.E_RECOMMEND ?? {},
          template: text(job.template) ?? 'onepage',
        }, seed);
    }
  }

  /**
   * Stage C: inline resume text goes through the rule-based parser and is
   * written to the cache under the `{ file_text, original_layout }` key.
   * Without text, the adapter is asked with an empty document.
   */
  private async parseResume(resume: JsonObject, seed: number): Promise<StageResult> {
    const stage: StageName = 'C_RESUME_PARSE';
    const fileText = text(resume.file_text);
    const originalLayout = objectOr(resume.original_layout, {});

    if (!fileText) {
      return this.runCached(stage, { file_text: '', original_layout: originalLayout }, seed);
    }

    let out: StageResult;
    try {
      out = toJsonObject(parseResumeText(fileText, originalLayout, { currentYear: this.currentYear() }));
      if (typeof out.confidence !== 'number') {
        out.confidence = DEFAULT_PARSER_CONFIDENCE;
      }
    } catch (err) {
      this.log.error({ err, stage }, 'Resume parser failed');
      return stageError(errorMessage(err));
    }

    const key = stageCacheKey(stage, { file_text: fileText, original_layout: originalLayout }, seed);
    await this.writeCache(key, out, stage);
    return out;
  }

  private async runCached(stage: StageName, payload: JsonObject, seed: number): Promise<StageResult> {
    const key = stageCacheKey(stage, payload, seed);

    const cached = await this.cache.get(key);
    if (!cached.success) {
      this.log.debug({ stage, key, err: cached.error.message }, 'Cache get failed');
    } else if (isJsonObject(cached.value)) {
      this.log.debug({ stage, key }, 'Stage cache hit');
      return cached.value;
    }

    let result: StageResult;
    try {
      result = await this.adapter.runStage(stage, payload, seed);
    } catch (err) {
      // Not cached.
      this.log.error({ err, stage }, 'Stage execution failed');
      return stageError(errorMessage(err));
    }

    await this.writeCache(key, result, stage);
    return result;
  }

  private async writeCache(key: string, value: StageResult, stage: StageName): Promise<void> {
    const written = await this.cache.set(key, value, this.ttlSeconds);
    if (!written.success) {
      this.log.debug({ stage, key, err: written.error.message }, 'Cache set failed');
    }
  }

  private async persist(
    final: PipelineResult,
    job: JsonObject,
    resume: JsonObject,
  ): Promise<string | null> {
    try {
      return await this.repository.createAssessment({
        user_id: text(job.user_id) ?? text(resume.user_id),
        job_id: final.job_id,
        resume_id: final.resume_id,
        final_score: final.final_score,
        results: toJsonObject(final),
        metadata: { persisted_at: new Date().toISOString() },
      });
    } catch (err) {
      this.log.error({ err, pipelineId: final.id }, 'Failed to persist assessment');
      return null;
    }
  }
}
