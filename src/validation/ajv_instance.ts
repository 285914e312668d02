/**
 * Ajv validation instance with schema validators
 * Every file read or written by a run goes through one of these
 */

import Ajv2020, { type ErrorObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type {
  RawMarketSnapshotFile,
  RawSectorMapFile,
  RawSignalsConfigFile,
} from '@/types/files';
import type { SignalRunRecord } from '@/types/run';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, date-time, ...)
addFormats(ajv);

// Lazy-loaded validators
let signalsConfigValidator: ValidateFunction<RawSignalsConfigFile> | null = null;
let marketSnapshotValidator: ValidateFunction<RawMarketSnapshotFile> | null = null;
let sectorMapValidator: ValidateFunction<RawSectorMapFile> | null = null;
let runValidator: ValidateFunction<SignalRunRecord> | null = null;

export function getSignalsConfigValidator(): ValidateFunction<RawSignalsConfigFile> {
  if (!signalsConfigValidator) {
    signalsConfigValidator = ajv.compile<RawSignalsConfigFile>(loadSchema('signals_config.v1'));
  }
  return signalsConfigValidator;
}

export function getMarketSnapshotValidator(): ValidateFunction<RawMarketSnapshotFile> {
  if (!marketSnapshotValidator) {
    marketSnapshotValidator = ajv.compile<RawMarketSnapshotFile>(loadSchema('market_snapshot.v1'));
  }
  return marketSnapshotValidator;
}

export function getSectorMapValidator(): ValidateFunction<RawSectorMapFile> {
  if (!sectorMapValidator) {
    sectorMapValidator = ajv.compile<RawSectorMapFile>(loadSchema('sector_map.v1'));
  }
  return sectorMapValidator;
}

export function getRunValidator(): ValidateFunction<SignalRunRecord> {
  if (!runValidator) {
    runValidator = ajv.compile<SignalRunRecord>(loadSchema('signal_run.v1'));
  }
  return runValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (
    errors?.map((e) => `${e.instancePath || 'root'}: ${e.message}`) ?? [
      'Unknown validation error',
    ]
  );
}

function check<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }
  return { valid: false, data: null, errors: formatErrors(validate.errors) };
}

export function validateSignalsConfig(data: unknown): ValidationResult<RawSignalsConfigFile> {
  return check(getSignalsConfigValidator(), data);
}

export function validateMarketSnapshot(data: unknown): ValidationResult<RawMarketSnapshotFile> {
  return check(getMarketSnapshotValidator(), data);
}

export function validateSectorMapFile(data: unknown): ValidationResult<RawSectorMapFile> {
  return check(getSectorMapValidator(), data);
}

export function validateRun(data: unknown): ValidationResult<SignalRunRecord> {
  return check(getRunValidator(), data);
}
