/**
 * Persisted run record (schemas/signal_run.v1.schema.json)
 */

export interface RunSignalEntry {
  rank: number;
  ticker: string;
  sector: string;
  composite_score: number;
  momentum_score: number;
  volume_surge_score: number;
  relative_strength_score: number;
  news_sentiment_score: number;
  catalyst_score: number;
  risk_score: number;
  price: number;
  atr: number;
  rsi: number | null;
  pct_change_today: number;
  catalyst_matches: string[];
}

export interface RunPipelineSummary {
  observation_count: number;
  filtered_count: number;
  scored_count: number;
  ranked_count: number;
  below_min_composite?: number;
  above_max_risk?: number;
  truncated: boolean;
  removed_by_reason: Record<string, string[]>;
}

export interface RunParameters {
  filters: Record<string, number>;
  signals: Record<string, number>;
  weights: Record<string, number>;
  scoring: Record<string, number>;
  catalyst_keywords: string[];
}

export interface RunIntegrity {
  config_hash: string;
  inputs_hash: string;
  output_hash: string;
}

export interface SignalRunRecord {
  run_id: string;
  run_date: string;
  as_of: string | null;
  score_version: string;
  signals: RunSignalEntry[];
  pipeline: RunPipelineSummary;
  parameters: RunParameters;
  integrity: RunIntegrity;
}
