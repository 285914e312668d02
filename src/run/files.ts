import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { describeError } from '@/core/errors';
import type { SignalRunRecord } from '@/types/run';
import { createChildLogger } from '@/utils/logger';
import { validateRun } from '@/validation/ajv_instance';
import { getRunDirectory } from './writer';

const logger = createChildLogger('run_files');

export interface RunFileInfo {
  filePath: string;
  run: SignalRunRecord;
  mtimeMs: number;
}

function readRunFile(filePath: string): SignalRunRecord | null {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logger.warn({ filePath, error: describeError(error) }, 'Skipping unreadable run file');
    return null;
  }

  const result = validateRun(raw);
  if (!result.valid || !result.data) {
    logger.warn({ filePath, errors: result.errors }, 'Skipping invalid run file');
    return null;
  }
  return result.data;
}

/** Most recent first; files that fail the run schema are skipped */
export function loadRunFiles(outputDir: string, limit: number = 20): RunFileInfo[] {
  const runsDir = getRunDirectory(outputDir);

  if (!existsSync(runsDir)) {
    return [];
  }

  const parsed: RunFileInfo[] = [];
  for (const file of readdirSync(runsDir).filter((f) => f.endsWith('.json'))) {
    const filePath = join(runsDir, file);
    const run = readRunFile(filePath);
    if (!run) continue;
    parsed.push({
      filePath,
      run,
      mtimeMs: statSync(filePath).mtimeMs,
    });
  }

  return parsed
    .sort((a, b) => {
      if (b.mtimeMs !== a.mtimeMs) {
        return b.mtimeMs - a.mtimeMs;
      }

      const aDate = Date.parse(a.run.run_date);
      const bDate = Date.parse(b.run.run_date);

      if (!Number.isNaN(aDate) && !Number.isNaN(bDate) && bDate !== aDate) {
        return bDate - aDate;
      }

      return b.filePath.localeCompare(a.filePath);
    })
    .slice(0, limit);
}

export function getLatestRunFile(outputDir: string): RunFileInfo | null {
  const [latest] = loadRunFiles(outputDir, 1);
  return latest ?? null;
}
