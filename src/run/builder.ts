/**
 * Run Record Builder
 * Constructs the run JSON written after every pipeline run
 */

import { contentHash } from '@/core/seed';
import { formatDate, getRunId } from '@/core/time';
import type { PipelineResult } from '@/scoring/pipeline';
import type { PipelineConfig } from '@/scoring/scoring_config';
import type { MarketSnapshot, Signal } from '@/types/signals';
import type { RunParameters, RunSignalEntry, SignalRunRecord } from '@/types/run';

export const SCORE_VERSION = '1.0.0';

export interface BuildRunOptions {
  runDate?: Date;
}

export function toRunSignalEntry(signal: Signal, rank: number): RunSignalEntry {
  return {
    rank,
    ticker: signal.ticker,
    sector: signal.sector,
    composite_score: signal.compositeScore,
    momentum_score: signal.momentumScore,
    volume_surge_score: signal.volumeSurgeScore,
    relative_strength_score: signal.relativeStrengthScore,
    news_sentiment_score: signal.newsSentimentScore,
    catalyst_score: signal.catalystScore,
    risk_score: signal.riskScore,
    price: signal.price,
    atr: signal.atr,
    rsi: signal.rsi,
    pct_change_today: signal.percentChangeToday,
    catalyst_matches: [...signal.catalystMatches],
  };
}

/** Effective configuration, in the config file's snake_case */
export function buildRunParameters(config: PipelineConfig): RunParameters {
  return {
    filters: {
      min_price: config.filters.minPrice,
      max_price: config.filters.maxPrice,
      min_avg_volume: config.filters.minAvgVolume,
      min_market_cap_millions: config.filters.minMarketCapMillions,
      max_float_millions: config.filters.maxFloatMillions,
    },
    signals: {
      min_composite_score: config.signals.minCompositeScore,
      max_acceptable_risk_score: config.signals.maxAcceptableRiskScore,
      max_signals_per_run: config.signals.maxSignalsPerRun,
    },
    weights: {
      momentum: config.weights.momentum,
      volume_surge: config.weights.volumeSurge,
      relative_strength: config.weights.relativeStrength,
      news_sentiment: config.weights.newsSentiment,
      catalyst: config.weights.catalyst,
    },
    scoring: {
      volume_surge_threshold_pct: config.scoring.volumeSurgeThresholdPct,
      relative_strength_threshold_pct: config.scoring.relativeStrengthThresholdPct,
    },
    catalyst_keywords: [...config.catalystKeywords],
  };
}

export function snapshotHash(snapshot: MarketSnapshot): string {
  return contentHash({
    as_of: snapshot.asOf,
    observations: snapshot.observations,
    news: snapshot.news,
    fundamentals: snapshot.fundamentals,
    sector_quotes: snapshot.sectorQuotes,
  });
}

/**
 * Same snapshot and configuration give the same signals, hashes and run id;
 * only run_date follows the clock.
 */
export function buildRunRecord(
  result: PipelineResult,
  config: PipelineConfig,
  snapshot: MarketSnapshot,
  options: BuildRunOptions = {}
): SignalRunRecord {
  const runDate = options.runDate ?? new Date();

  const parameters = buildRunParameters(config);
  const signals = result.signals.map((signal, index) => toRunSignalEntry(signal, index + 1));

  const configHash = contentHash(parameters);
  const inputsHash = snapshotHash(snapshot);
  const outputHash = contentHash(signals);

  const { stats } = result;
  const removedByReason: Record<string, string[]> = {};
  for (const [reason, tickers] of Object.entries(stats.removedByReason)) {
    removedByReason[reason] = [...tickers];
  }

  return {
    run_id: getRunId(runDate, inputsHash),
    run_date: formatDate(runDate),
    as_of: snapshot.asOf,
    score_version: SCORE_VERSION,
    signals,
    pipeline: {
      observation_count: stats.observationCount,
      filtered_count: stats.filteredCount,
      scored_count: stats.scoredCount,
      ranked_count: stats.rankedCount,
      below_min_composite: stats.belowMinComposite,
      above_max_risk: stats.aboveMaxRisk,
      truncated: stats.truncated,
      removed_by_reason: removedByReason,
    },
    parameters,
    integrity: {
      config_hash: configHash,
      inputs_hash: inputsHash,
      output_hash: outputHash,
    },
  };
}
