/**
 * Scoring Engine
 * Maps raw momentum, volume, relative strength, news and catalyst inputs onto
 * 0-100 and combines them with a fixed weight set.
 */

import { clamp } from './normalize';
import {
  DEFAULT_SCORING_THRESHOLDS,
  DEFAULT_WEIGHTS,
  type ScoringThresholds,
  type ScoringWeights,
} from './scoring_config';
import type { CatalystEvent, ComponentScores } from '@/types/signals';

const RSI_OVERSOLD = 30;
const RSI_OVERBOUGHT = 70;

export class ScoringEngine {
  readonly weights: Readonly<ScoringWeights>;
  readonly thresholds: Readonly<ScoringThresholds>;

  constructor(
    weights: ScoringWeights = DEFAULT_WEIGHTS,
    thresholds: ScoringThresholds = DEFAULT_SCORING_THRESHOLDS
  ) {
    // frozen copies; callers keep their own objects
    this.weights = Object.freeze({ ...weights });
    this.thresholds = Object.freeze({ ...thresholds });
  }

  /**
   * RSI extremes score above the neutral band: oversold readings get a bonus
   * that grows toward RSI 0, overbought readings one that grows toward 100.
   * Both extremes land in (50, 100], above the neutral band's [25, 50], so
   * RSI 25 scores 58.33.
   */
  momentumScore(rsi: number | null | undefined): number {
    if (rsi === null || rsi === undefined || Number.isNaN(rsi)) {
      return 0;
    }

    let score: number;
    if (rsi < RSI_OVERSOLD) {
      score = ((RSI_OVERSOLD - rsi) / 30) * 50 + 50;
    } else if (rsi > RSI_OVERBOUGHT) {
      score = ((rsi - RSI_OVERBOUGHT) / 30) * 50 + 50;
    } else {
      score = 25 + ((rsi - RSI_OVERSOLD) / 40) * 25;
    }

    return clamp(score);
  }

  /**
   * Only volume above `threshold` percent of the 20-day average scores at all.
   */
  volumeSurgeScore(
    currentVolume: number,
    avgVolume: number,
    threshold: number = this.thresholds.volumeSurgeThresholdPct
  ): number {
    if (avgVolume === 0) {
      return 0;
    }

    const ratio = (currentVolume / avgVolume) * 100;
    if (ratio < threshold) {
      return 0;
    }

    return clamp(((ratio - threshold) / (threshold * 2)) * 100);
  }

  relativeStrengthScore(
    stockPctChange: number,
    sectorPctChange: number,
    minThreshold: number = this.thresholds.relativeStrengthThresholdPct
  ): number {
    const diff = stockPctChange - sectorPctChange;

    if (diff < -minThreshold) {
      return 0;
    }
    // In-line with the sector is neutral, not a penalty
    if (diff < minThreshold) {
      return 25;
    }
    return Math.min(100, 25 + ((diff - minThreshold) / minThreshold) * 75);
  }

  newsSentimentScore(positiveCount: number, totalCount: number): number {
    if (totalCount === 0) {
      return 50;
    }
    return (positiveCount / totalCount) * 100;
  }

  catalystScore(events: readonly CatalystEvent[]): number {
    if (events.length === 0) {
      return 0;
    }

    let total = 0;
    for (const event of events) {
      if (event.daysAgo <= 7) {
        total += 100;
      } else if (event.daysAgo <= 30) {
        total += 50;
      }
    }

    return Math.min(100, total / events.length);
  }

  compositeScore(components: ComponentScores): number {
    const composite =
      components.momentum * this.weights.momentum +
      components.volumeSurge * this.weights.volumeSurge +
      components.relativeStrength * this.weights.relativeStrength +
      components.newsSentiment * this.weights.newsSentiment +
      components.catalyst * this.weights.catalyst;

    return clamp(composite);
  }
}
