/**
 * Pipeline configuration loaded from config/signals.json
 */

import { existsSync, readFileSync } from 'fs';
import { getEnvConfig } from './env';
import { ConfigError, describeError } from './errors';
import { assertValidPipelineConfig, type PipelineConfig } from '@/scoring/scoring_config';
import { validateSignalsConfig } from '@/validation/ajv_instance';
import type { RawSignalsConfigFile } from '@/types/files';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('config');

export interface LoadConfigOptions {
  /** Defaults to SIGNALS_CONFIG, then config/signals.json */
  path?: string;
}

let cachedConfig: PipelineConfig | null = null;
let cachedPath: string | null = null;

/** snake_case file sections onto the camelCase runtime shape; absent options take their defaults */
export function toPipelineConfig(file: RawSignalsConfigFile): PipelineConfig {
  const signals = file.signals ?? {};
  const scoring = file.scoring ?? {};
  return assertValidPipelineConfig({
    filters: {
      minPrice: file.filters.min_price,
      maxPrice: file.filters.max_price,
      minAvgVolume: file.filters.min_avg_volume,
      minMarketCapMillions: file.filters.min_market_cap_millions,
      maxFloatMillions: file.filters.max_float_millions,
    },
    signals: {
      minCompositeScore: signals.min_composite_score,
      maxAcceptableRiskScore: signals.max_acceptable_risk_score,
      maxSignalsPerRun: signals.max_signals_per_run,
    },
    weights: {
      momentum: file.weights.momentum,
      volumeSurge: file.weights.volume_surge,
      relativeStrength: file.weights.relative_strength,
      newsSentiment: file.weights.news_sentiment,
      catalyst: file.weights.catalyst,
    },
    scoring: {
      volumeSurgeThresholdPct: scoring.volume_surge_threshold_pct,
      relativeStrengthThresholdPct: scoring.relative_strength_threshold_pct,
    },
    catalystKeywords: file.catalyst_keywords,
  });
}

export function parsePipelineConfig(raw: unknown, source: string = 'config'): PipelineConfig {
  const result = validateSignalsConfig(raw);
  if (!result.valid || !result.data) {
    throw new ConfigError(`signals config invalid: ${source}`, result.errors ?? []);
  }
  return toPipelineConfig(result.data);
}

export function loadPipelineConfig(options: LoadConfigOptions = {}): PipelineConfig {
  const path = options.path ?? getEnvConfig().signalsConfigPath;
  if (cachedConfig && cachedPath === path) {
    return cachedConfig;
  }

  if (!existsSync(path)) {
    throw new ConfigError(`signals config not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`signals config is not valid JSON: ${path}`, [describeError(error)]);
  }

  const config = parsePipelineConfig(raw, path);
  logger.debug(
    { path, keywords: config.catalystKeywords.length, maxSignals: config.signals.maxSignalsPerRun },
    'Pipeline config loaded'
  );

  cachedConfig = config;
  cachedPath = path;
  return config;
}

export function resetPipelineConfig(): void {
  cachedConfig = null;
  cachedPath = null;
}
