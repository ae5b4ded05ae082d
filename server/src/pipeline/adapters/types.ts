import type { JsonObject } from '../../lib/json.js';
import type { StageName, StageResult } from '../types.js';

export interface StageAdapter {
  readonly name: string;
  runStage(stage: StageName, input: JsonObject, seed: number): Promise<StageResult>;
}
