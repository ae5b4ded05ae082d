import { createHash } from 'node:crypto';
import { canonicalJson, isJsonObject, type JsonObject, type JsonValue } from '../../lib/json.js';
import type { StageName, StageResult } from '../types.js';
import type { StageAdapter } from './types.js';

/** Maps the SHA-256 of `text` to a number in [0, 1). */
function hashToUnit(text: string): number {
  const hex = createHash('sha256').update(text, 'utf8').digest('hex');
  return parseInt(hex.slice(0, 8), 16) / 0x1_0000_0000;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function str(value: JsonValue | undefined, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function obj(value: JsonValue | undefined): JsonObject {
  return isJsonObject(value) ? value : {};
}

function stringList(value: JsonValue | undefined): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/** Distinct words longer than two characters, in first-seen order. */
function distinctTokens(text: string, limit: number): string[] {
  const seen = new Set<string>();
  for (const word of text.split(/\s+/)) {
    if (word.length <= 2) continue;
    const token = word.replace(/^[.,()]+|[.,()]+$/g, '');
    if (!token || seen.has(token)) continue;
    seen.add(token);
    if (seen.size >= limit) break;
  }
  return [...seen];
}

function normalize(input: JsonObject, base: number): StageResult {
  return {
    cleaned_text: str(input.content).slice(0, 2000),
    company: str(input.company, 'unknown'),
    role_title: str(input.title, 'Unknown Role'),
    posting_date: typeof input.posted_date === 'string' ? input.posted_date : null,
    ats_candidates: [{ name: 'GenericATS', confidence: round(base, 2) }],
    notes: 'deterministic normalizer',
    confidence: round(0.5 + base * 0.5, 3),
  };
}

function extract(input: JsonObject, base: number): StageResult {
  const text = str(input.cleaned_text) || str(input.content);
  const tokens = distinctTokens(text, 20);
  const must = tokens.slice(0, 3);
  const nice = tokens.slice(3, 6);
  return {
    role_title: str(input.role_title, 'Unknown'),
    seniority: base > 0.5 ? 'Mid-level' : 'Entry',
    years_experience: { min: 2, max: 5 },
    must_have_skills: must,
    nice_to_have_skills: nice,
    non_negotiable: [],
    tools: tokens.slice(6, 9),
    certifications: [],
    ats_keyword_list: tokens.slice(0, 10).map((term) => ({
      term,
      platform_relevance: { GenericATS: round(0.8 * base, 2) },
    })),
    skill_categories: { technical: [...must, ...nice] },
    confidence: round(0.6 + base * 0.4, 3),
  };
}

function parseResume(input: JsonObject, base: number): StageResult {
  const text = str(input.file_text).slice(0, 2000);
  const skills = text.includes('SQL') || text.includes('Python') ? ['SQL', 'Python'] : ['Communication'];
  return {
    contact: { name: 'Test User', email: 'test@example.com' },
    skills,
    experience: [{
      company: 'ACME',
      title: 'Analyst',
      start: '2019-01',
      end: '2022-01',
      bullets: [text.slice(0, 120)],
    }],
    education: [],
    suspicious_claims: [],
    original_layout: obj(input.original_layout),
    confidence: round(0.6 + base * 0.4, 3),
  };
}

function score(input: JsonObject, base: number): StageResult {
  const jdSkills = [...new Set(stringList(obj(input.jd).must_have_skills))];
  const resumeSkills = new Set(stringList(obj(input.resume).skills));
  const matched = jdSkills.filter((skill) => resumeSkills.has(skill));
  const skillsPct = jdSkills.length === 0 ? 0 : matched.length / jdSkills.length;

  return {
    matching_summary: { must_have_match_pct: round(skillsPct * 100, 2) },
    score: round(50 + skillsPct * 50 * base, 2),
    score_breakdown: {
      skills: round(skillsPct * 40, 2),
      ats_keywords: round(20 * base, 2),
      format: 10,
      parseability: 10,
    },
    matches: jdSkills.slice(0, 10).map((term) => ({
      term,
      found: resumeSkills.has(term),
      match_type: 'exact',
    })),
    misses: jdSkills
      .filter((term) => !resumeSkills.has(term))
      .map((term) => ({ term, reason: 'not found' })),
    confidence: round(0.6 + base * 0.3, 3),
  };
}

function recommend(input: JsonObject, base: number): StageResult {
  const must = stringList(obj(input.jd).must_have_skills).slice(0, 3);
  return {
    recommendation_list: must.map((skill) => ({
      level: 'High',
      action: `Add '${skill}' to Skills section`,
      impact: 5,
    })),
    latex_actions: [],
    confidence: round(0.6 + base * 0.4, 3),
  };
}

function adaptLatex(_input: JsonObject, base: number): StageResult {
  return {
    patches: [{ file: 'resume.tex', insert: '% example inserted' }],
    preview_info: { pages: 1 },
    confidence: round(0.5 + base * 0.4, 3),
  };
}

const BUILDERS: Record<StageName, (input: JsonObject, base: number) => StageResult> = {
  A_JD_NORMALIZER: normalize,
  B_JD_EXTRACT: extract,
  C_RESUME_PARSE: parseResume,
  D_MATCHER_SCORER: score,
  E_RECOMMEND: recommend,
  F_LATEX_ADAPT: adaptLatex,
};

/**
 * Rule-based stand-in for the inference service. Output depends only on
 * (stage, input, seed), so repeated calls are byte-identical.
 */
export class LocalStageAdapter implements StageAdapter {
  readonly name = 'local';

  async runStage(stage: StageName, input: JsonObject, seed: number): Promise<StageResult> {
    const base = hashToUnit(canonicalJson({ stage, seed, input }));
    return BUILDERS[stage](input, base);
  }
}
