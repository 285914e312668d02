/**
 * Run Writer
 * Saves run records to <outputDir>/runs/<run_id>.json
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { contentHash } from '@/core/seed';
import type { SignalRunRecord } from '@/types/run';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('run_writer');

export interface WriteResult {
  runId: string;
  filePath: string;
  contentHash: string;
}

export function getRunDirectory(outputDir: string): string {
  return join(outputDir, 'runs');
}

export function writeRunRecord(run: SignalRunRecord, outputDir: string): WriteResult {
  const runsDir = getRunDirectory(outputDir);

  // Ensure directory exists
  if (!existsSync(runsDir)) {
    mkdirSync(runsDir, { recursive: true });
  }

  const filePath = join(runsDir, `${run.run_id}.json`);
  const hash = contentHash(run);

  writeFileSync(filePath, JSON.stringify(run, null, 2), 'utf-8');

  logger.info({ runId: run.run_id, filePath }, 'Run record written');

  return {
    runId: run.run_id,
    filePath,
    contentHash: hash,
  };
}
