import { describe, it, expect } from 'vitest';
import { ConfigError, SignalRankerError } from '@/core/errors';
import {
  assertValidPipelineConfig,
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_WEIGHTS,
  weightSum,
} from '@/scoring/scoring_config';

function configError(raw: unknown): ConfigError {
  try {
    assertValidPipelineConfig(raw);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('scoring config', () => {
  it('default weights sum to 1', () => {
    expect(weightSum(DEFAULT_WEIGHTS)).toBeCloseTo(1, 10);
  });

  it('accepts the defaults and returns a frozen copy', () => {
    const config = assertValidPipelineConfig(DEFAULT_PIPELINE_CONFIG);
    expect(config).toEqual(DEFAULT_PIPELINE_CONFIG);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.weights)).toBe(true);
    expect(Object.isFrozen(config.catalystKeywords)).toBe(true);
  });

  it('lowercases and de-duplicates catalyst keywords', () => {
    const config = assertValidPipelineConfig({
      ...DEFAULT_PIPELINE_CONFIG,
      catalystKeywords: ['Beat', ' beat ', 'LAUNCH'],
    });
    expect(config.catalystKeywords).toEqual(['beat', 'launch']);
  });

  it('fills signals, scoring and keyword defaults when they are absent', () => {
    const config = assertValidPipelineConfig({
      filters: DEFAULT_PIPELINE_CONFIG.filters,
      weights: DEFAULT_WEIGHTS,
    });
    expect(config).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it('fills single missing threshold keys from the defaults', () => {
    const config = assertValidPipelineConfig({
      filters: DEFAULT_PIPELINE_CONFIG.filters,
      weights: DEFAULT_WEIGHTS,
      signals: { maxSignalsPerRun: 3 },
      scoring: { relativeStrengthThresholdPct: 2 },
    });
    expect(config.signals).toEqual({
      minCompositeScore: 50,
      maxAcceptableRiskScore: 75,
      maxSignalsPerRun: 3,
    });
    expect(config.scoring).toEqual({
      volumeSurgeThresholdPct: 150,
      relativeStrengthThresholdPct: 2,
    });
  });

  it('rejects optional options that are present but malformed', () => {
    const error = configError({
      filters: DEFAULT_PIPELINE_CONFIG.filters,
      weights: DEFAULT_WEIGHTS,
      signals: { minCompositeScore: 'high' },
      scoring: 5,
    });
    expect(error.details).toEqual([
      'signals.minCompositeScore must be a finite number',
      'scoring section must be an object',
    ]);
  });

  it('rejects a non-object configuration', () => {
    const error = configError(undefined);
    expect(error.code).toBe('config_invalid');
    expect(error.details).toEqual(['configuration is not an object']);
  });

  it('rejects missing weights', () => {
    const { weights: _weights, ...rest } = DEFAULT_PIPELINE_CONFIG;
    expect(configError(rest).details).toEqual(['weights section missing']);
  });

  it('rejects weights that do not sum to 1', () => {
    const error = configError({
      ...DEFAULT_PIPELINE_CONFIG,
      weights: { ...DEFAULT_WEIGHTS, catalyst: 0.3 },
    });
    expect(error.details).toHaveLength(1);
    expect(error.details[0]).toMatch(/^weights must sum to 1.0, got 1.15/);
  });

  it('rejects negative weights', () => {
    const error = configError({
      ...DEFAULT_PIPELINE_CONFIG,
      weights: { ...DEFAULT_WEIGHTS, momentum: -0.25, catalyst: 0.65 },
    });
    expect(error.details).toContain('weights.momentum is negative');
  });

  it('rejects non-numeric thresholds', () => {
    const error = configError({
      ...DEFAULT_PIPELINE_CONFIG,
      filters: { ...DEFAULT_PIPELINE_CONFIG.filters, minPrice: '2' },
    });
    expect(error.details).toContain('filters.minPrice missing or not a finite number');
  });

  it('rejects an inverted price band', () => {
    const error = configError({
      ...DEFAULT_PIPELINE_CONFIG,
      filters: { ...DEFAULT_PIPELINE_CONFIG.filters, minPrice: 600 },
    });
    expect(error.details).toEqual(['filters.maxPrice (500) is below filters.minPrice (600)']);
  });

  it('rejects a fractional signal cap', () => {
    const error = configError({
      ...DEFAULT_PIPELINE_CONFIG,
      signals: { ...DEFAULT_PIPELINE_CONFIG.signals, maxSignalsPerRun: 2.5 },
    });
    expect(error.details).toEqual(['signals.maxSignalsPerRun must be a positive integer, got 2.5']);
  });

  it('rejects a keyword list that is not strings', () => {
    const error = configError({ ...DEFAULT_PIPELINE_CONFIG, catalystKeywords: 'beat' });
    expect(error.details).toEqual(['catalystKeywords must be an array of strings']);
  });

  it('reports every problem at once', () => {
    const error = configError({ filters: {}, signals: {}, scoring: {}, catalystKeywords: [] });
    expect(error).toBeInstanceOf(SignalRankerError);
    expect(error.details).toContain('weights section missing');
    expect(error.details).toContain('filters.minPrice missing or not a finite number');
    expect(error.message).toMatch(/^config_invalid: pipeline configuration invalid \(/);
  });
});
