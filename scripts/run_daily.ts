/**
 * Daily Run Script
 * Scores one market snapshot and writes the run record and workbook
 *
 * Usage: npx tsx scripts/run_daily.ts --snapshot=data/samples/market_snapshot.sample.json
 *   [--config=config/signals.json] [--output=output] [--no-excel]
 */

import dotenv from 'dotenv';
import { resolve, join } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getEnvConfig } from '../src/core/env';
import { loadPipelineConfig } from '../src/core/config';
import { describeError, SignalRankerError } from '../src/core/errors';
import { loadMarketSnapshot } from '../src/data/snapshot_loader';
import { SignalPipeline } from '../src/scoring/pipeline';
import { loadSectorMap } from '../src/scoring/sector_map';
import { buildRunRecord } from '../src/run/builder';
import { writeRunRecord } from '../src/run/writer';
import { getLatestRunFile } from '../src/run/files';
import { validateAndThrow, checkRunConsistency } from '../src/run/validator';
import { writeSignalsWorkbook } from '../src/lib/excelExport';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_daily');

const SAMPLE_SNAPSHOT = join('data', 'samples', 'market_snapshot.sample.json');

interface DailyRunCliArgs {
  snapshotPath: string;
  configPath: string;
  outputDir: string;
  excel: boolean;
}

function readFlag(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`--${name}=`));
  if (eqArg) return eqArg.slice(name.length + 3);
  const posIndex = process.argv.findIndex((arg) => arg === `--${name}`);
  return posIndex >= 0 ? process.argv[posIndex + 1] : undefined;
}

function applyCliArgs(): DailyRunCliArgs {
  const env = getEnvConfig();
  return {
    snapshotPath: resolve(readFlag('snapshot') ?? env.snapshotPath ?? SAMPLE_SNAPSHOT),
    configPath: resolve(readFlag('config') ?? env.signalsConfigPath),
    outputDir: resolve(readFlag('output') ?? env.outputDir),
    excel: !process.argv.includes('--no-excel'),
  };
}

async function main() {
  const startTime = Date.now();
  logger.info('Starting signal run');

  try {
    const args = applyCliArgs();

    const config = loadPipelineConfig({ path: args.configPath });
    const sectorMap = loadSectorMap();
    const snapshot = loadMarketSnapshot(args.snapshotPath);

    const result = new SignalPipeline(config, sectorMap).run(snapshot);

    logger.info('Building run record...');
    const runRecord = buildRunRecord(result, config, snapshot);

    logger.info('Validating run record...');
    validateAndThrow(runRecord);

    const consistency = checkRunConsistency(runRecord);
    if (!consistency.passed) {
      logger.warn({ issues: consistency.issues }, 'Run consistency issues detected');
    }

    const previous = getLatestRunFile(args.outputDir);
    const writeResult = writeRunRecord(runRecord, args.outputDir);
    const workbookPath = args.excel
      ? await writeSignalsWorkbook(runRecord, snapshot, args.outputDir)
      : null;

    // Summary
    const duration = (Date.now() - startTime) / 1000;
    const { pipeline } = runRecord;
    console.log('\n' + '='.repeat(50));
    console.log('SIGNAL RUN COMPLETE');
    console.log('='.repeat(50));
    console.log(`Run ID:        ${runRecord.run_id}`);
    console.log(`As of:         ${runRecord.as_of ?? '-'}`);
    console.log(`Observed:      ${pipeline.observation_count}`);
    console.log(`Passed filter: ${pipeline.filtered_count}`);
    console.log(`Ranked:        ${pipeline.ranked_count}`);
    console.log(`Duration:      ${duration.toFixed(1)}s`);

    console.log('\nTop 5:');
    runRecord.signals.slice(0, 5).forEach((signal) => {
      console.log(
        `  ${signal.rank}. ${signal.ticker} - ${signal.composite_score.toFixed(1)}/100 (risk ${signal.risk_score.toFixed(0)})`
      );
    });
    if (runRecord.signals.length === 0) {
      console.log('  (no signals passed the thresholds)');
    }

    if (previous) {
      const [previousTop] = previous.run.signals;
      console.log(
        `\nPrevious run:  ${previous.run.run_id} - top pick ${previousTop ? `${previousTop.ticker} (${previousTop.composite_score.toFixed(1)})` : 'none'}`
      );
    }

    console.log('\nOutput Files:');
    console.log(`  - ${writeResult.filePath}`);
    if (workbookPath) console.log(`  - ${workbookPath}`);
    console.log('='.repeat(50) + '\n');
  } catch (error) {
    if (error instanceof SignalRankerError) {
      logger.error({ code: error.code, details: error.details }, error.message);
    } else {
      logger.error({ error: describeError(error) }, 'Signal run failed');
    }
    console.error('Signal run failed:', describeError(error));
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(describeError(error));
  process.exit(1);
});
