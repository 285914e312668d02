/**
 * Signal pipeline: Filter -> Score -> Rank over one market snapshot
 */

import { ScoringEngine } from './engine';
import { filterSymbols, type FilterReason } from './filters';
import { rankSignals } from './rank';
import { scoreSymbol, type ScoreContext } from './score_symbol';
import { assertValidPipelineConfig, type PipelineConfig } from './scoring_config';
import { SectorMap } from './sector_map';
import { InputShapeError } from '@/core/errors';
import type { MarketSnapshot, Signal } from '@/types/signals';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('pipeline');

export interface PipelineStats {
  observationCount: number;
  filteredCount: number;
  scoredCount: number;
  rankedCount: number;
  belowMinComposite: number;
  aboveMaxRisk: number;
  truncated: boolean;
  removedByReason: Record<FilterReason, string[]>;
}

export interface PipelineResult {
  /** Ranked output, at most maxSignalsPerRun long */
  signals: Signal[];
  /** Every scored signal, in filter order, before the rank gates */
  scored: Signal[];
  stats: PipelineStats;
}

const SNAPSHOT_MAPPINGS = ['observations', 'news', 'fundamentals', 'sectorQuotes'] as const;

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural check for in-memory callers. Per-ticker gaps are tolerated later;
 * a missing mapping is not.
 */
export function assertSnapshotShape(snapshot: unknown): asserts snapshot is MarketSnapshot {
  if (!isMapping(snapshot)) {
    throw new InputShapeError('market snapshot missing', ['snapshot is not an object']);
  }
  const issues: string[] = [];
  for (const key of SNAPSHOT_MAPPINGS) {
    if (!isMapping(snapshot[key])) {
      issues.push(`${key} is missing or not an object`);
    }
  }
  if (issues.length > 0) {
    throw new InputShapeError('market snapshot malformed', issues);
  }
}

export class SignalPipeline {
  readonly config: PipelineConfig;
  readonly sectorMap: SectorMap;
  readonly engine: ScoringEngine;

  constructor(config: unknown, sectorMap: SectorMap = new SectorMap()) {
    this.config = assertValidPipelineConfig(config);
    this.sectorMap = sectorMap;
    this.engine = new ScoringEngine(this.config.weights, this.config.scoring);
  }

  filter(snapshot: MarketSnapshot) {
    return filterSymbols(snapshot.observations, snapshot.fundamentals, this.config.filters);
  }

  score(tickers: readonly string[], snapshot: MarketSnapshot): Signal[] {
    const context: ScoreContext = {
      engine: this.engine,
      sectorMap: this.sectorMap,
      catalystKeywords: this.config.catalystKeywords,
    };

    const signals: Signal[] = [];
    for (const ticker of tickers) {
      const signal = scoreSymbol(ticker, snapshot, context);
      if (!signal) {
        logger.debug({ ticker }, 'No observation, skipping');
        continue;
      }
      logger.debug(
        { ticker, composite: signal.compositeScore, risk: signal.riskScore },
        'Symbol scored'
      );
      signals.push(signal);
    }
    return signals;
  }

  rank(signals: readonly Signal[]) {
    return rankSignals(signals, this.config.signals);
  }

  run(snapshot: MarketSnapshot): PipelineResult {
    assertSnapshotShape(snapshot);

    const coverage = this.sectorMap.coverage(snapshot);
    if (coverage.unmapped.length > 0) {
      logger.debug(
        { tickers: coverage.unmapped, defaultSector: this.sectorMap.defaultSector },
        'Tickers without a sector entry'
      );
    }
    if (coverage.missingQuotes.length > 0) {
      logger.warn({ sectors: coverage.missingQuotes }, 'No sector quote, sector move taken as 0%');
    }

    const filtered = this.filter(snapshot);
    const scored = this.score(filtered.passedSymbols, snapshot);
    const ranked = this.rank(scored);

    const stats: PipelineStats = {
      observationCount: Object.keys(snapshot.observations).length,
      filteredCount: filtered.passedSymbols.length,
      scoredCount: scored.length,
      rankedCount: ranked.signals.length,
      belowMinComposite: ranked.belowMinComposite,
      aboveMaxRisk: ranked.aboveMaxRisk,
      truncated: ranked.truncated,
      removedByReason: filtered.removedByReason,
    };

    logger.info(
      {
        observations: stats.observationCount,
        filtered: stats.filteredCount,
        scored: stats.scoredCount,
        ranked: stats.rankedCount,
      },
      'Pipeline run complete'
    );

    return { signals: ranked.signals, scored, stats };
  }
}

export function runSignalPipeline(
  snapshot: MarketSnapshot,
  config: unknown,
  sectorMap: SectorMap = new SectorMap()
): PipelineResult {
  return new SignalPipeline(config, sectorMap).run(snapshot);
}
