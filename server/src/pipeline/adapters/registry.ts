import type { AdapterKind, AppConfig } from '../../lib/config.js';
import { ConfigError, errorMessage } from '../../lib/errors.js';
import type { JsonObject } from '../../lib/json.js';
import logger from '../../lib/logger.js';
import type { StageName, StageResult } from '../types.js';
import { HttpStageAdapter } from './http-adapter.js';
import { LocalStageAdapter } from './local-adapter.js';
import type { StageAdapter } from './types.js';

type AdapterFactory = (config: AppConfig['adapter']) => StageAdapter;

const ADAPTER_REGISTRY: Record<AdapterKind, AdapterFactory> = {
  local: () => new LocalStageAdapter(),
  http: (config) => {
    if (!config.http) {
      throw new ConfigError('HTTP stage adapter selected without STAGE_ADAPTER_HTTP_URL');
    }
    return new HttpStageAdapter(config.http);
  },
};

/**
 * Wraps the configured adapter. When the primary throws and a fallback is
 * present, the same call is replayed on the fallback and its result returned,
 * so callers only ever see a result or a final error.
 */
export class StageAdapterFacade implements StageAdapter {
  readonly name: string;

  constructor(
    private readonly primary: StageAdapter,
    private readonly fallback: StageAdapter | null,
  ) {
    this.name = fallback ? `${primary.name}+${fallback.name}` : primary.name;
  }

  async runStage(stage: StageName, input: JsonObject, seed: number): Promise<StageResult> {
    try {
      return await this.primary.runStage(stage, input, seed);
    } catch (err) {
      if (!this.fallback) throw err;
      logger.warn(
        { stage, adapter: this.primary.name, fallback: this.fallback.name, err: errorMessage(err) },
        'Stage adapter failed, using fallback',
      );
      return this.fallback.runStage(stage, input, seed);
    }
  }
}

/** Resolves the adapter once at startup from configuration. */
export function createStageAdapter(config: AppConfig['adapter']): StageAdapter {
  const primary = ADAPTER_REGISTRY[config.kind](config);
  const fallback = config.fallback && config.kind !== 'local' ? new LocalStageAdapter() : null;
  return new StageAdapterFacade(primary, fallback);
}
