/**
 * Rank stage: order by composite, apply the score and risk gates, cap the list
 */

import type { SignalThresholds } from './scoring_config';
import type { Signal } from '@/types/signals';

export interface RankResult {
  signals: Signal[];
  belowMinComposite: number;
  aboveMaxRisk: number;
  truncated: boolean;
}

/** Stable: equal composites keep their incoming order */
export function sortByComposite(signals: readonly Signal[]): Signal[] {
  return signals.slice().sort((a, b) => b.compositeScore - a.compositeScore);
}

export function rankSignals(signals: readonly Signal[], thresholds: SignalThresholds): RankResult {
  let belowMinComposite = 0;
  let aboveMaxRisk = 0;

  const eligible = sortByComposite(signals).filter((signal) => {
    if (signal.compositeScore < thresholds.minCompositeScore) {
      belowMinComposite++;
      return false;
    }
    if (signal.riskScore > thresholds.maxAcceptableRiskScore) {
      aboveMaxRisk++;
      return false;
    }
    return true;
  });

  return {
    signals: eligible.slice(0, thresholds.maxSignalsPerRun),
    belowMinComposite,
    aboveMaxRisk,
    truncated: eligible.length > thresholds.maxSignalsPerRun,
  };
}
