import { randomUUID } from 'node:crypto';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { JsonObject } from './json.js';

const ASSESSMENTS_TABLE = 'assessments';
const HISTORY_TABLE = 'assessment_history';

export interface AssessmentCreate {
  user_id: string | null;
  job_id: string | null;
  resume_id: string | null;
  final_score: number;
  results: JsonObject;
  metadata: JsonObject;
}

export interface AssessmentRecord extends AssessmentCreate {
  id: string;
  created_at: string;
  updated_at: string;
}

/** A later score correction. Assessments themselves are never updated. */
export interface HistoryRecord {
  id: string;
  assessment_id: string;
  old_score: number | null;
  new_score: number | null;
  diff: JsonObject;
  created_at: string;
}

export interface ListOptions {
  userId?: string;
  limit?: number;
  offset?: number;
}

export interface AssessmentRepository {
  createAssessment(record: AssessmentCreate): Promise<string>;
  getAssessment(id: string): Promise<AssessmentRecord | null>;
  listAssessments(options?: ListOptions): Promise<AssessmentRecord[]>;
  appendHistory(
    assessmentId: string,
    oldScore: number | null,
    newScore: number | null,
    diff?: JsonObject,
  ): Promise<string>;
  listHistory(assessmentId: string, limit?: number): Promise<HistoryRecord[]>;
}

export class SupabaseAssessmentRepository implements AssessmentRepository {
  constructor(private readonly client: SupabaseClient) {}

  async createAssessment(record: AssessmentCreate): Promise<string> {
    const now = new Date().toISOString();
    const { data, error } = await this.client
      .from(ASSESSMENTS_TABLE)
      .insert({ ...record, created_at: now, updated_at: now })
      .select('id')
      .single();
    if (error || !data) {
      throw new Error(`Failed to insert assessment: ${error?.message ?? 'no row returned'}`);
    }
    return String(data.id);
  }

  async getAssessment(id: string): Promise<AssessmentRecord | null> {
    const { data, error } = await this.client
      .from(ASSESSMENTS_TABLE)
      .select('*')
      .eq('id', id)
      .maybeSingle();
    if (error) throw new Error(`Failed to load assessment ${id}: ${error.message}`);
    return data ?? null;
  }

  async listAssessments(options: ListOptions = {}): Promise<AssessmentRecord[]> {
    const limit = options.limit ?? 20;
    const offset = options.offset ?? 0;
    let query = this.client
      .from(ASSESSMENTS_TABLE)
      .select('*')
      .order('created_at', { ascending: false })
      .range(offset, offset + limit - 1);
    if (options.userId) {
      query = query.eq('user_id', options.userId);
    }
    const { data, error } = await query;
    if (error) throw new Error(`Failed to list assessments: ${error.message}`);
    return data ?? [];
  }

  async appendHistory(
    assessmentId: string,
    oldScore: number | null,
    newScore: number | null,
    diff: JsonObject = {},
  ): Promise<string> {
    const { data, error } = await this.client
      .from(HISTORY_TABLE)
      .insert({
        assessment_id: assessmentId,
        old_score: oldScore,
        new_score: newScore,
        diff,
        created_at: new Date().toISOString(),
      })
      .select('id')
      .single();
    if (error || !data) {
      throw new Error(`Failed to append history for ${assessmentId}: ${error?.message ?? 'no row returned'}`);
    }
    return String(data.id);
  }

  async listHistory(assessmentId: string, limit = 50): Promise<HistoryRecord[]> {
    const { data, error } = await this.client
      .from(HISTORY_TABLE)
      .select('*')
      .eq('assessment_id', assessmentId)
      .order('created_at', { ascending: false })
      .limit(limit);
    if (error) throw new Error(`Failed to list history for ${assessmentId}: ${error.message}`);
    return data ?? [];
  }
}

/**
 * Process-local repository for development and tests. Selected by
 * configuration, never as a fallback for a failing database.
 */
export class InMemoryAssessmentRepository implements AssessmentRepository {
  private readonly assessments = new Map<string, AssessmentRecord>();
  private readonly history: HistoryRecord[] = [];

  async createAssessment(record: AssessmentCreate): Promise<string> {
    const id = randomUUID();
    const now = new Date().toISOString();
    this.assessments.set(id, { ...record, id, created_at: now, updated_at: now });
    return id;
  }

  async getAssessment(id: string): Promise<AssessmentRecord | null> {
    return this.assessments.get(id) ?? null;
  }

  async listAssessments(options: ListOptions = {}): Promise<AssessmentRecord[]> {
    const limit = options.limit ?? 20;
    const offset = options.offset ?? 0;
    return [...this.assessments.values()]
      .filter((a) => !options.userId || a.user_id === options.userId)
      .reverse()
      .slice(offset, offset + limit);
  }

  async appendHistory(
    assessmentId: string,
    oldScore: number | null,
    newScore: number | null,
    diff: JsonObject = {},
  ): Promise<string> {
    const id = randomUUID();
    this.history.push({
      id,
      assessment_id: assessmentId,
      old_score: oldScore,
      new_score: newScore,
      diff,
      created_at: new Date().toISOString(),
    });
    return id;
  }

  async listHistory(assessmentId: string, limit = 50): Promise<HistoryRecord[]> {
    return this.history
      .filter((h) => h.assessment_id === assessmentId)
      .reverse()
      .slice(0, limit);
  }
}
