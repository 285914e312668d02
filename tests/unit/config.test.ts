import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadPipelineConfig, parsePipelineConfig, resetPipelineConfig } from '@/core/config';
import { ConfigError } from '@/core/errors';
import { DEFAULT_PIPELINE_CONFIG } from '@/scoring/scoring_config';

let tempDir: string;

const minimalFile = {
  filters: {
    min_price: 5,
    max_price: 100,
    min_avg_volume: 250000,
    min_market_cap_millions: 200,
    max_float_millions: 150,
  },
  weights: {
    momentum: 0.2,
    volume_surge: 0.2,
    relative_strength: 0.2,
    news_sentiment: 0.2,
    catalyst: 0.2,
  },
};

function writeConfig(name: string, content: unknown): string {
  const path = join(tempDir, name);
  writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
  return path;
}

describe('pipeline config loader', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'signals-config-'));
    resetPipelineConfig();
  });

  afterEach(() => {
    resetPipelineConfig();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads the shipped configuration', () => {
    const config = loadPipelineConfig({ path: join(process.cwd(), 'config', 'signals.json') });
    expect(config).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it('maps snake_case sections and fills in optional defaults', () => {
    const config = loadPipelineConfig({ path: writeConfig('minimal.json', minimalFile) });

    expect(config.filters).toEqual({
      minPrice: 5,
      maxPrice: 100,
      minAvgVolume: 250000,
      minMarketCapMillions: 200,
      maxFloatMillions: 150,
    });
    expect(config.weights.volumeSurge).toBe(0.2);
    expect(config.signals).toEqual(DEFAULT_PIPELINE_CONFIG.signals);
    expect(config.scoring).toEqual(DEFAULT_PIPELINE_CONFIG.scoring);
    expect(config.catalystKeywords).toEqual(DEFAULT_PIPELINE_CONFIG.catalystKeywords);
  });

  it('caches per path until reset', () => {
    const path = writeConfig('cached.json', minimalFile);
    const first = loadPipelineConfig({ path });
    expect(loadPipelineConfig({ path })).toBe(first);

    resetPipelineConfig();
    expect(loadPipelineConfig({ path })).not.toBe(first);
  });

  it('fails when weights are absent', () => {
    const { weights: _weights, ...noWeights } = minimalFile;
    const path = writeConfig('no-weights.json', noWeights);
    expect(() => loadPipelineConfig({ path })).toThrow(ConfigError);
    expect(() => loadPipelineConfig({ path })).toThrow(/must have required property 'weights'/);
  });

  it('fails when weights do not sum to 1', () => {
    const path = writeConfig('skewed.json', {
      ...minimalFile,
      weights: { ...minimalFile.weights, catalyst: 0.5 },
    });
    expect(() => loadPipelineConfig({ path })).toThrow(/weights must sum to 1.0/);
  });

  it('fails on unknown sections', () => {
    expect(() => parsePipelineConfig({ ...minimalFile, extra: true })).toThrow(
      /must NOT have additional properties/
    );
  });

  it('fails on a missing file or invalid JSON', () => {
    expect(() => loadPipelineConfig({ path: join(tempDir, 'nope.json') })).toThrow(
      /signals config not found/
    );
    const broken = writeConfig('broken.json', '{ "filters": ');
    expect(() => loadPipelineConfig({ path: broken })).toThrow(/not valid JSON/);
  });

  it('fails on an empty keyword', () => {
    expect(() => parsePipelineConfig({ ...minimalFile, catalyst_keywords: [''] })).toThrow(
      ConfigError
    );
  });
});
