/**
 * Filter stage
 * Removes symbols outside the tradable price, liquidity, size and float band
 * before any scoring happens.
 */

import type { FilterThresholds } from './scoring_config';
import type { FundamentalRecord, MarketObservation } from '@/types/signals';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('filters');

export type FilterReason = 'price' | 'volume' | 'market_cap' | 'float';

export interface FilteredSymbolsResult {
  /** Eligible tickers, in observation insertion order */
  passedSymbols: string[];
  removedCount: number;
  removedByReason: Record<FilterReason, string[]>;
}

/** First predicate the symbol fails, or null when it passes all four */
export function filterRejection(
  observation: MarketObservation,
  fundamentals: FundamentalRecord | undefined,
  filters: FilterThresholds
): FilterReason | null {
  const { price, volume } = observation;
  if (!Number.isFinite(price) || price < filters.minPrice || price > filters.maxPrice) {
    return 'price';
  }
  if (!(volume >= filters.minAvgVolume)) {
    return 'volume';
  }

  // missing fundamentals count as zero
  const marketCap = fundamentals?.marketCapMillions ?? 0;
  const float = fundamentals?.floatMillions ?? 0;
  if (!(marketCap >= filters.minMarketCapMillions)) {
    return 'market_cap';
  }
  if (!(float <= filters.maxFloatMillions)) {
    return 'float';
  }
  return null;
}

export function filterSymbols(
  observations: Readonly<Record<string, MarketObservation>>,
  fundamentals: Readonly<Record<string, FundamentalRecord>>,
  filters: FilterThresholds
): FilteredSymbolsResult {
  const removedByReason: Record<FilterReason, string[]> = {
    price: [],
    volume: [],
    market_cap: [],
    float: [],
  };

  const passedSymbols: string[] = [];
  for (const [ticker, observation] of Object.entries(observations)) {
    const reason = filterRejection(observation, fundamentals[ticker], filters);
    if (reason) {
      removedByReason[reason].push(ticker);
      logger.debug({ ticker, reason }, 'Symbol filtered out');
      continue;
    }
    passedSymbols.push(ticker);
  }

  const removedCount =
    removedByReason.price.length +
    removedByReason.volume.length +
    removedByReason.market_cap.length +
    removedByReason.float.length;

  logger.info(
    { total: passedSymbols.length + removedCount, passed: passedSymbols.length, removedCount },
    'Filter stage complete'
  );

  return {
    passedSymbols,
    removedCount,
    removedByReason,
  };
}
