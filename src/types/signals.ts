/**
 * Value records consumed and produced by one signal pipeline run
 */

export type NewsSentiment = 'Positive' | 'Neutral' | 'Negative';

export interface MarketObservation {
  readonly ticker: string;
  readonly price: number;
  readonly volume: number;
  /** 0 when unknown */
  readonly averageVolume20Day: number;
  readonly rsi: number | null;
  readonly atr: number;
  readonly percentChangeToday: number;
}

export interface NewsItem {
  readonly ticker: string;
  readonly headline: string;
  readonly sentiment: NewsSentiment;
  readonly source: string;
  readonly timestamp: string;
}

export interface FundamentalRecord {
  readonly ticker: string;
  readonly marketCapMillions: number;
  readonly floatMillions: number;
  readonly peRatio: number | null;
}

export interface SectorQuote {
  readonly sectorSymbol: string;
  readonly percentChangeToday: number;
}

export interface MarketSnapshot {
  readonly asOf: string | null;
  readonly observations: Readonly<Record<string, MarketObservation>>;
  readonly news: Readonly<Record<string, readonly NewsItem[]>>;
  readonly fundamentals: Readonly<Record<string, FundamentalRecord>>;
  readonly sectorQuotes: Readonly<Record<string, SectorQuote>>;
}

export interface ComponentScores {
  readonly momentum: number;
  readonly volumeSurge: number;
  readonly relativeStrength: number;
  readonly newsSentiment: number;
  readonly catalyst: number;
}

export interface CatalystEvent {
  readonly keyword: string;
  readonly daysAgo: number;
}

export interface Signal {
  readonly ticker: string;
  readonly sector: string;
  readonly momentumScore: number;
  readonly volumeSurgeScore: number;
  readonly relativeStrengthScore: number;
  readonly newsSentimentScore: number;
  readonly catalystScore: number;
  readonly compositeScore: number;
  readonly riskScore: number;
  readonly price: number;
  readonly atr: number;
  readonly rsi: number | null;
  readonly percentChangeToday: number;
  readonly catalystMatches: readonly string[];
}
