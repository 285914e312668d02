/**
 * Score stage: one observation plus its news and sector quote into a Signal
 */

import { catalystEventsFromMatches, findCatalystKeywords } from './catalysts';
import type { ScoringEngine } from './engine';
import { finiteOr, roundScore } from './normalize';
import { riskScore } from './risk';
import type { SectorMap } from './sector_map';
import type { ComponentScores, MarketSnapshot, NewsItem, Signal } from '@/types/signals';

export interface ScoreContext {
  engine: ScoringEngine;
  sectorMap: SectorMap;
  catalystKeywords: readonly string[];
}

export function countPositive(news: readonly NewsItem[]): number {
  return news.filter((item) => item.sentiment === 'Positive').length;
}

/**
 * Returns null when the snapshot has no observation for the ticker.
 * Components are rounded for output only; the composite uses the exact values.
 */
export function scoreSymbol(
  ticker: string,
  snapshot: MarketSnapshot,
  context: ScoreContext
): Signal | null {
  const observation = snapshot.observations[ticker];
  if (!observation) return null;

  const { engine, sectorMap, catalystKeywords } = context;

  const price = finiteOr(observation.price, 0);
  const volume = finiteOr(observation.volume, 0);
  const averageVolume = finiteOr(observation.averageVolume20Day, 0);
  const atr = finiteOr(observation.atr, 0);
  const percentChange = finiteOr(observation.percentChangeToday, 0);
  const rsi =
    observation.rsi !== null && Number.isFinite(observation.rsi) ? observation.rsi : null;

  const sector = sectorMap.resolve(ticker);
  const sectorChange = finiteOr(snapshot.sectorQuotes[sector]?.percentChangeToday, 0);

  const news = snapshot.news[ticker] ?? [];
  const matches = findCatalystKeywords(news, catalystKeywords);

  const components: ComponentScores = {
    momentum: engine.momentumScore(rsi),
    volumeSurge: engine.volumeSurgeScore(volume, averageVolume),
    relativeStrength: engine.relativeStrengthScore(percentChange, sectorChange),
    newsSentiment: engine.newsSentimentScore(countPositive(news), news.length),
    catalyst: engine.catalystScore(catalystEventsFromMatches(matches)),
  };

  return Object.freeze({
    ticker,
    sector,
    momentumScore: roundScore(components.momentum),
    volumeSurgeScore: roundScore(components.volumeSurge),
    relativeStrengthScore: roundScore(components.relativeStrength),
    newsSentimentScore: roundScore(components.newsSentiment),
    catalystScore: roundScore(components.catalyst),
    compositeScore: roundScore(engine.compositeScore(components)),
    riskScore: roundScore(riskScore(atr, price)),
    price,
    atr,
    rsi,
    percentChangeToday: percentChange,
    catalystMatches: Object.freeze(matches),
  });
}
