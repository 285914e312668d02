/**
 * On-disk JSON shapes (snake_case), as accepted by the schemas in schemas/
 */

import type { NewsSentiment } from './signals';

export interface RawSignalsConfigFile {
  filters: {
    min_price: number;
    max_price: number;
    min_avg_volume: number;
    min_market_cap_millions: number;
    max_float_millions: number;
  };
  signals?: {
    min_composite_score?: number;
    max_acceptable_risk_score?: number;
    max_signals_per_run?: number;
  };
  weights: {
    momentum: number;
    volume_surge: number;
    relative_strength: number;
    news_sentiment: number;
    catalyst: number;
  };
  scoring?: {
    volume_surge_threshold_pct?: number;
    relative_strength_threshold_pct?: number;
  };
  catalyst_keywords?: string[];
}

export interface RawSectorMapFile {
  default_sector?: string;
  sectors?: Record<string, string[]>;
}

export interface RawObservation {
  price: number;
  volume: number;
  avg_volume_20d?: number | null;
  rsi?: number | null;
  atr?: number | null;
  pct_change?: number | null;
}

export interface RawNewsItem {
  headline: string;
  sentiment: NewsSentiment;
  source?: string;
  timestamp?: string;
}

export interface RawFundamentals {
  market_cap_millions?: number | null;
  float_millions?: number | null;
  pe_ratio?: number | null;
}

export interface RawSectorQuote {
  pct_change: number;
}

export interface RawMarketSnapshotFile {
  as_of?: string;
  observations: Record<string, RawObservation>;
  news: Record<string, RawNewsItem[]>;
  fundamentals: Record<string, RawFundamentals>;
  sector_quotes: Record<string, RawSectorQuote>;
}
