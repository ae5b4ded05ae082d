import type { JsonObject } from '../lib/json.js';

export const STAGES = [
  { name: 'A_JD_NORMALIZER', label: 'JD Normalizer & ATS Detector' },
  { name: 'B_JD_EXTRACT', label: 'JD Extractor' },
  { name: 'C_RESUME_PARSE', label: 'Resume Parser' },
  { name: 'D_MATCHER_SCORER', label: 'Matcher & Scorer' },
  { name: 'E_RECOMMEND', label: 'Recommendation Generator' },
  { name: 'F_LATEX_ADAPT', label: 'LaTeX Suggest Adapter' },
] as const;

export type StageName = (typeof STAGES)[number]['name'];

export const STAGE_NAMES: readonly StageName[] = STAGES.map((stage) => stage.name);

/**
 * Output of one stage. The stage's own keys sit beside the reserved
 * `confidence`, `error` and `error_message` fields.
 */
export type StageResult = JsonObject;

export type StageResults = Partial<Record<StageName, StageResult>>;

export interface PipelineMeta {
  seed: number;
  job_source: string | null;
  company: string | null;
  role_title: string | null;
}

export interface PipelineResult {
  id: string;
  created_at: string;
  stages: StageResults;
  final_score: number;
  job_id: string | null;
  resume_id: string | null;
  meta: PipelineMeta;
  assessment_id: string | null;
}

export function stageError(message: string): StageResult {
  return { error: true, error_message: message, confidence: 0 };
}

export function isStageError(result: StageResult | undefined): boolean {
  return result?.error === true;
}
