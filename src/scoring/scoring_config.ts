/**
 * Pipeline configuration: filter thresholds, ranking thresholds, composite
 * weights and catalyst keywords, plus the structural checks that make a
 * malformed configuration fail the run up front.
 */

import { ConfigError } from '@/core/errors';

export interface FilterThresholds {
  readonly minPrice: number;
  readonly maxPrice: number;
  readonly minAvgVolume: number;
  readonly minMarketCapMillions: number;
  readonly maxFloatMillions: number;
}

export interface SignalThresholds {
  readonly minCompositeScore: number;
  readonly maxAcceptableRiskScore: number;
  readonly maxSignalsPerRun: number;
}

export interface ScoringWeights {
  readonly momentum: number;
  readonly volumeSurge: number;
  readonly relativeStrength: number;
  readonly newsSentiment: number;
  readonly catalyst: number;
}

export interface ScoringThresholds {
  /** Percent of 20-day average volume below which a surge scores 0 */
  readonly volumeSurgeThresholdPct: number;
  /** Percentage-point band around the sector move treated as in-line */
  readonly relativeStrengthThresholdPct: number;
}

export interface PipelineConfig {
  readonly filters: FilterThresholds;
  readonly signals: SignalThresholds;
  readonly weights: ScoringWeights;
  readonly scoring: ScoringThresholds;
  readonly catalystKeywords: readonly string[];
}

export const DEFAULT_FILTERS: FilterThresholds = {
  minPrice: 2,
  maxPrice: 500,
  minAvgVolume: 500_000,
  minMarketCapMillions: 100,
  maxFloatMillions: 250,
};

export const DEFAULT_SIGNAL_THRESHOLDS: SignalThresholds = {
  minCompositeScore: 50,
  maxAcceptableRiskScore: 75,
  maxSignalsPerRun: 10,
};

export const DEFAULT_WEIGHTS: ScoringWeights = {
  momentum: 0.25,
  volumeSurge: 0.2,
  relativeStrength: 0.2,
  newsSentiment: 0.2,
  catalyst: 0.15,
};

export const DEFAULT_SCORING_THRESHOLDS: ScoringThresholds = {
  volumeSurgeThresholdPct: 150,
  relativeStrengthThresholdPct: 5.0,
};

export const DEFAULT_CATALYST_KEYWORDS: readonly string[] = [
  'beat',
  'launch',
  'expansion',
  'partnership',
  'acquisition',
];

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  filters: DEFAULT_FILTERS,
  signals: DEFAULT_SIGNAL_THRESHOLDS,
  weights: DEFAULT_WEIGHTS,
  scoring: DEFAULT_SCORING_THRESHOLDS,
  catalystKeywords: DEFAULT_CATALYST_KEYWORDS,
};

const WEIGHT_SUM_TOLERANCE = 1e-6;

const WEIGHT_KEYS: Array<keyof ScoringWeights> = [
  'momentum',
  'volumeSurge',
  'relativeStrength',
  'newsSentiment',
  'catalyst',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(
  root: Record<string, unknown>,
  section: string,
  issues: string[]
): Record<string, unknown> | null {
  const raw = root[section];
  if (!isRecord(raw)) {
    issues.push(`${section} section missing`);
    return null;
  }
  return raw;
}

/** Absent optional section: null, so every key takes its default */
function readOptionalSection(
  root: Record<string, unknown>,
  section: string,
  issues: string[]
): Record<string, unknown> | null {
  const raw = root[section];
  if (raw === undefined) return null;
  if (!isRecord(raw)) {
    issues.push(`${section} section must be an object`);
    return null;
  }
  return raw;
}

function readNumberOr(
  section: Record<string, unknown> | null,
  sectionName: string,
  key: string,
  fallback: number,
  issues: string[]
): number {
  const value = section?.[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    issues.push(`${sectionName}.${key} must be a finite number`);
    return Number.NaN;
  }
  return value;
}

function readNumber(
  section: Record<string, unknown> | null,
  sectionName: string,
  key: string,
  issues: string[]
): number {
  // a missing section has already been reported once
  if (!section) return Number.NaN;
  const value = section[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    issues.push(`${sectionName}.${key} missing or not a finite number`);
    return Number.NaN;
  }
  return value;
}

export function weightSum(weights: ScoringWeights): number {
  return WEIGHT_KEYS.reduce((sum, key) => sum + weights[key], 0);
}

/**
 * Validate a configuration of unknown shape and return a deeply frozen copy.
 * `filters` and `weights` are required; `signals`, `scoring` and
 * `catalystKeywords` fall back to their defaults key by key when absent.
 * Throws ConfigError listing every problem found.
 */
export function assertValidPipelineConfig(raw: unknown): PipelineConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('pipeline configuration missing', ['configuration is not an object']);
  }

  const issues: string[] = [];

  const filtersRaw = readSection(raw, 'filters', issues);
  const filters: FilterThresholds = {
    minPrice: readNumber(filtersRaw, 'filters', 'minPrice', issues),
    maxPrice: readNumber(filtersRaw, 'filters', 'maxPrice', issues),
    minAvgVolume: readNumber(filtersRaw, 'filters', 'minAvgVolume', issues),
    minMarketCapMillions: readNumber(filtersRaw, 'filters', 'minMarketCapMillions', issues),
    maxFloatMillions: readNumber(filtersRaw, 'filters', 'maxFloatMillions', issues),
  };

  const signalsRaw = readOptionalSection(raw, 'signals', issues);
  const signals: SignalThresholds = {
    minCompositeScore: readNumberOr(
      signalsRaw,
      'signals',
      'minCompositeScore',
      DEFAULT_SIGNAL_THRESHOLDS.minCompositeScore,
      issues
    ),
    maxAcceptableRiskScore: readNumberOr(
      signalsRaw,
      'signals',
      'maxAcceptableRiskScore',
      DEFAULT_SIGNAL_THRESHOLDS.maxAcceptableRiskScore,
      issues
    ),
    maxSignalsPerRun: readNumberOr(
      signalsRaw,
      'signals',
      'maxSignalsPerRun',
      DEFAULT_SIGNAL_THRESHOLDS.maxSignalsPerRun,
      issues
    ),
  };

  const weightsRaw = readSection(raw, 'weights', issues);
  const weights: ScoringWeights = {
    momentum: readNumber(weightsRaw, 'weights', 'momentum', issues),
    volumeSurge: readNumber(weightsRaw, 'weights', 'volumeSurge', issues),
    relativeStrength: readNumber(weightsRaw, 'weights', 'relativeStrength', issues),
    newsSentiment: readNumber(weightsRaw, 'weights', 'newsSentiment', issues),
    catalyst: readNumber(weightsRaw, 'weights', 'catalyst', issues),
  };

  const scoringRaw = readOptionalSection(raw, 'scoring', issues);
  const scoring: ScoringThresholds = {
    volumeSurgeThresholdPct: readNumberOr(
      scoringRaw,
      'scoring',
      'volumeSurgeThresholdPct',
      DEFAULT_SCORING_THRESHOLDS.volumeSurgeThresholdPct,
      issues
    ),
    relativeStrengthThresholdPct: readNumberOr(
      scoringRaw,
      'scoring',
      'relativeStrengthThresholdPct',
      DEFAULT_SCORING_THRESHOLDS.relativeStrengthThresholdPct,
      issues
    ),
  };

  if (filters.maxPrice < filters.minPrice) {
    issues.push(`filters.maxPrice (${filters.maxPrice}) is below filters.minPrice (${filters.minPrice})`);
  }

  if (Number.isFinite(signals.maxSignalsPerRun)) {
    if (!Number.isInteger(signals.maxSignalsPerRun) || signals.maxSignalsPerRun < 1) {
      issues.push(`signals.maxSignalsPerRun must be a positive integer, got ${signals.maxSignalsPerRun}`);
    }
  }

  if (WEIGHT_KEYS.every((key) => Number.isFinite(weights[key]))) {
    for (const key of WEIGHT_KEYS) {
      if (weights[key] < 0) issues.push(`weights.${key} is negative`);
    }
    const total = weightSum(weights);
    if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
      issues.push(`weights must sum to 1.0, got ${total}`);
    }
  }

  if (scoring.volumeSurgeThresholdPct <= 0) {
    issues.push('scoring.volumeSurgeThresholdPct must be positive');
  }
  if (scoring.relativeStrengthThresholdPct <= 0) {
    issues.push('scoring.relativeStrengthThresholdPct must be positive');
  }

  const keywordsRaw = raw.catalystKeywords ?? DEFAULT_CATALYST_KEYWORDS;
  const keywords: string[] = [];
  if (!Array.isArray(keywordsRaw)) {
    issues.push('catalystKeywords must be an array of strings');
  } else {
    for (const keyword of keywordsRaw) {
      if (typeof keyword !== 'string' || keyword.trim() === '') {
        issues.push(`catalystKeywords contains an invalid entry: ${JSON.stringify(keyword)}`);
        continue;
      }
      const normalized = keyword.trim().toLowerCase();
      if (!keywords.includes(normalized)) keywords.push(normalized);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError('pipeline configuration invalid', issues);
  }

  return Object.freeze({
    filters: Object.freeze(filters),
    signals: Object.freeze(signals),
    weights: Object.freeze(weights),
    scoring: Object.freeze(scoring),
    catalystKeywords: Object.freeze(keywords),
  });
}
