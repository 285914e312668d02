/**
 * Run Validator
 * Validates run records against the schema and their own invariants
 */

import { contentHash } from '@/core/seed';
import type { SignalRunRecord } from '@/types/run';
import { createChildLogger } from '@/utils/logger';
import { validateRun, type ValidationResult } from '@/validation/ajv_instance';

const logger = createChildLogger('run_validator');

export function validateRunRecord(data: unknown): ValidationResult<SignalRunRecord> {
  const result = validateRun(data);

  if (!result.valid) {
    logger.error({ errors: result.errors }, 'Run validation failed');
  } else {
    logger.debug('Run validation passed');
  }

  return result;
}

export function validateAndThrow(data: unknown): SignalRunRecord {
  const result = validateRunRecord(data);

  if (!result.valid || !result.data) {
    throw new Error(`Run validation failed: ${result.errors?.join('; ') ?? 'Unknown error'}`);
  }

  return result.data;
}

export interface ConsistencyCheck {
  passed: boolean;
  issues: string[];
}

export function checkRunConsistency(run: SignalRunRecord): ConsistencyCheck {
  const issues: string[] = [];
  const { signals, parameters, pipeline } = run;

  // Ranks are 1..n in output order
  signals.forEach((signal, index) => {
    if (signal.rank !== index + 1) {
      issues.push(`Signal ${signal.ticker} has rank ${signal.rank}, expected ${index + 1}`);
    }
  });

  for (let i = 1; i < signals.length; i++) {
    if (signals[i].composite_score > signals[i - 1].composite_score) {
      issues.push(`Signals not sorted by composite at rank ${signals[i].rank}`);
    }
  }

  const maxSignals = parameters.signals.max_signals_per_run;
  if (maxSignals !== undefined && signals.length > maxSignals) {
    issues.push(`Signal count (${signals.length}) exceeds max_signals_per_run (${maxSignals})`);
  }

  const minComposite = parameters.signals.min_composite_score;
  const maxRisk = parameters.signals.max_acceptable_risk_score;
  for (const signal of signals) {
    if (minComposite !== undefined && signal.composite_score < minComposite) {
      issues.push(`Signal ${signal.ticker} below min_composite_score`);
    }
    if (maxRisk !== undefined && signal.risk_score > maxRisk) {
      issues.push(`Signal ${signal.ticker} above max_acceptable_risk_score`);
    }
  }

  const tickers = new Set(signals.map((s) => s.ticker));
  if (tickers.size !== signals.length) {
    issues.push('Duplicate tickers in signals');
  }

  if (pipeline.ranked_count !== signals.length) {
    issues.push(
      `ranked_count (${pipeline.ranked_count}) doesn't match signal count (${signals.length})`
    );
  }

  if (contentHash(signals) !== run.integrity.output_hash) {
    issues.push('output_hash does not match signals');
  }

  return {
    passed: issues.length === 0,
    issues,
  };
}
