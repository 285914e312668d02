/**
 * Market snapshot loading: one JSON file holds every input of a run
 */

import { existsSync, readFileSync } from 'fs';
import { InputShapeError, describeError } from '@/core/errors';
import type { RawMarketSnapshotFile } from '@/types/files';
import type {
  FundamentalRecord,
  MarketObservation,
  MarketSnapshot,
  NewsItem,
  SectorQuote,
} from '@/types/signals';
import { createChildLogger } from '@/utils/logger';
import { validateMarketSnapshot } from '@/validation/ajv_instance';

const logger = createChildLogger('snapshot_loader');

function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

/** Keys differing only in case or whitespace collide; the first one in the file wins */
function isDuplicate(target: object, key: string, rawKey: string, mapping: string): boolean {
  if (!Object.hasOwn(target, key)) return false;
  logger.warn(
    { mapping, key: rawKey, normalized: key },
    'Duplicate ticker after normalization, keeping the first entry'
  );
  return true;
}

export function toMarketSnapshot(file: RawMarketSnapshotFile): MarketSnapshot {
  const observations: Record<string, MarketObservation> = {};
  for (const [key, raw] of Object.entries(file.observations)) {
    const ticker = normalizeTicker(key);
    if (isDuplicate(observations, ticker, key, 'observations')) continue;
    observations[ticker] = Object.freeze({
      ticker,
      price: raw.price,
      volume: raw.volume,
      averageVolume20Day: raw.avg_volume_20d ?? 0,
      rsi: raw.rsi ?? null,
      atr: raw.atr ?? 0,
      percentChangeToday: raw.pct_change ?? 0,
    });
  }

  const news: Record<string, readonly NewsItem[]> = {};
  for (const [key, items] of Object.entries(file.news)) {
    const ticker = normalizeTicker(key);
    if (isDuplicate(news, ticker, key, 'news')) continue;
    news[ticker] = Object.freeze(
      items.map((item) =>
        Object.freeze({
          ticker,
          headline: item.headline,
          sentiment: item.sentiment,
          source: item.source ?? '',
          timestamp: item.timestamp ?? '',
        })
      )
    );
  }

  const fundamentals: Record<string, FundamentalRecord> = {};
  for (const [key, raw] of Object.entries(file.fundamentals)) {
    const ticker = normalizeTicker(key);
    if (isDuplicate(fundamentals, ticker, key, 'fundamentals')) continue;
    fundamentals[ticker] = Object.freeze({
      ticker,
      marketCapMillions: raw.market_cap_millions ?? 0,
      floatMillions: raw.float_millions ?? 0,
      peRatio: raw.pe_ratio ?? null,
    });
  }

  const sectorQuotes: Record<string, SectorQuote> = {};
  for (const [key, raw] of Object.entries(file.sector_quotes)) {
    const sectorSymbol = normalizeTicker(key);
    if (isDuplicate(sectorQuotes, sectorSymbol, key, 'sector_quotes')) continue;
    sectorQuotes[sectorSymbol] = Object.freeze({
      sectorSymbol,
      percentChangeToday: raw.pct_change,
    });
  }

  return Object.freeze({
    asOf: file.as_of ?? null,
    observations: Object.freeze(observations),
    news: Object.freeze(news),
    fundamentals: Object.freeze(fundamentals),
    sectorQuotes: Object.freeze(sectorQuotes),
  });
}

export function parseMarketSnapshot(raw: unknown, source: string = 'snapshot'): MarketSnapshot {
  const result = validateMarketSnapshot(raw);
  if (!result.valid || !result.data) {
    throw new InputShapeError(`market snapshot invalid: ${source}`, result.errors ?? []);
  }
  return toMarketSnapshot(result.data);
}

export function loadMarketSnapshot(path: string): MarketSnapshot {
  if (!existsSync(path)) {
    throw new InputShapeError(`market snapshot not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new InputShapeError(`market snapshot is not valid JSON: ${path}`, [describeError(error)]);
  }

  const snapshot = parseMarketSnapshot(raw, path);
  logger.info(
    {
      path,
      observations: Object.keys(snapshot.observations).length,
      newsTickers: Object.keys(snapshot.news).length,
      sectors: Object.keys(snapshot.sectorQuotes).length,
    },
    'Market snapshot loaded'
  );
  return snapshot;
}
