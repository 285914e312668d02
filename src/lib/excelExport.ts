import ExcelJS from 'exceljs';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { format } from 'date-fns';
import type { SignalRunRecord } from '@/types/run';
import type { MarketSnapshot } from '@/types/signals';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('excel_export');

export const BUY_THRESHOLD = 75;

export interface WorkbookOptions {
  /** Shown as "Last Refresh" on the dashboard; defaults to now */
  refreshedAt?: Date;
}

const HEADER_BG = '1A1F36';
const HEADER_FONT = 'FFFFFF';
const GREEN_BG = 'C6EFCE';
const GREEN_FONT = '006100';
const YELLOW_BG = 'FFEB9C';
const YELLOW_FONT = '9C6500';
const RED_BG = 'FFC7CE';
const RED_FONT = '9C0006';

function applyScoreConditionalFormatting(cell: ExcelJS.Cell, score: number) {
  if (score >= 60) {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: GREEN_BG } };
    cell.font = { color: { argb: GREEN_FONT } };
  } else if (score >= 40) {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: YELLOW_BG } };
    cell.font = { color: { argb: YELLOW_FONT } };
  } else {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: RED_BG } };
    cell.font = { color: { argb: RED_FONT } };
  }
}

function styleHeaderRow(row: ExcelJS.Row) {
  row.height = 20;
  row.eachCell((cell) => {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_BG } };
    cell.font = { bold: true, color: { argb: HEADER_FONT }, size: 11 };
    cell.alignment = { horizontal: 'center', vertical: 'middle' };
    cell.border = {
      top: { style: 'thin' },
      left: { style: 'thin' },
      bottom: { style: 'thin' },
      right: { style: 'thin' },
    };
  });
}

function setColumnWidths(sheet: ExcelJS.Worksheet, widths: number[]) {
  widths.forEach((width, index) => {
    sheet.getColumn(index + 1).width = width;
  });
}

function addAutoFilter(sheet: ExcelJS.Worksheet, endColumn: string) {
  sheet.autoFilter = `A1:${endColumn}1`;
}

function freezeHeader(sheet: ExcelJS.Worksheet) {
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
}

export function signalStatus(compositeScore: number): 'BUY' | 'HOLD' {
  return compositeScore > BUY_THRESHOLD ? 'BUY' : 'HOLD';
}

function addDashboardSheet(workbook: ExcelJS.Workbook, run: SignalRunRecord, refreshedAt: Date) {
  const sheet = workbook.addWorksheet('Dashboard');
  const top = run.signals[0];

  sheet.getCell('A1').value = 'TRADING SIGNALS DASHBOARD';
  sheet.getCell('A1').font = { bold: true, size: 14 };

  const rows: Array<[string, string | number]> = [
    ['Last Refresh', format(refreshedAt, 'yyyy-MM-dd HH:mm:ss')],
    ['Run ID', run.run_id],
    ['Top Pick', top ? top.ticker : 'N/A'],
    ['Top Score', top ? top.composite_score : 'N/A'],
    ['Num Signals', run.signals.length],
    ['Symbols Observed', run.pipeline.observation_count],
    ['Symbols Passing Filters', run.pipeline.filtered_count],
  ];
  rows.forEach(([label, value], index) => {
    const rowNumber = index + 3;
    sheet.getCell(`A${rowNumber}`).value = label;
    sheet.getCell(`A${rowNumber}`).font = { bold: true };
    sheet.getCell(`B${rowNumber}`).value = value;
  });

  setColumnWidths(sheet, [24, 30]);
}

function addSignalsSheet(workbook: ExcelJS.Workbook, run: SignalRunRecord) {
  const sheet = workbook.addWorksheet('Signals');

  sheet.addRow([
    'Rank', 'Ticker', 'Sector', 'Price', 'Score',
    'Momentum', 'Volume Surge', 'Rel Strength', 'News Sentiment', 'Catalyst',
    'Risk', 'Status',
  ]);
  styleHeaderRow(sheet.getRow(1));

  for (const signal of run.signals) {
    const row = sheet.addRow([
      signal.rank,
      signal.ticker,
      signal.sector,
      signal.price,
      signal.composite_score,
      signal.momentum_score,
      signal.volume_surge_score,
      signal.relative_strength_score,
      signal.news_sentiment_score,
      signal.catalyst_score,
      signal.risk_score,
      signalStatus(signal.composite_score),
    ]);

    row.getCell(4).numFmt = '#,##0.00';
    for (let col = 5; col <= 11; col++) {
      row.getCell(col).numFmt = '0.0';
      row.getCell(col).alignment = { horizontal: 'right' };
    }
    row.getCell(1).alignment = { horizontal: 'center' };
    row.getCell(12).alignment = { horizontal: 'center' };

    applyScoreConditionalFormatting(row.getCell(5), signal.composite_score);
  }

  setColumnWidths(sheet, [6, 10, 10, 12, 10, 12, 14, 14, 16, 10, 10, 10]);
  addAutoFilter(sheet, 'L');
  freezeHeader(sheet);
}

function addNewsSheet(workbook: ExcelJS.Workbook, run: SignalRunRecord, snapshot: MarketSnapshot) {
  const sheet = workbook.addWorksheet('News');

  sheet.addRow(['Ticker', 'Headline', 'Source', 'Sentiment', 'Time']);
  styleHeaderRow(sheet.getRow(1));

  for (const signal of run.signals) {
    for (const item of snapshot.news[signal.ticker] ?? []) {
      sheet.addRow([signal.ticker, item.headline, item.source, item.sentiment, item.timestamp]);
    }
  }

  setColumnWidths(sheet, [10, 60, 18, 12, 22]);
  freezeHeader(sheet);
}

function addParametersSheet(workbook: ExcelJS.Workbook, run: SignalRunRecord) {
  const sheet = workbook.addWorksheet('Parameters');

  sheet.addRow(['Category', 'Parameter', 'Value']);
  styleHeaderRow(sheet.getRow(1));

  const { catalyst_keywords: keywords, ...numeric } = run.parameters;
  for (const [category, values] of Object.entries(numeric)) {
    for (const [key, value] of Object.entries(values)) {
      sheet.addRow([category, key, value]);
    }
  }
  sheet.addRow(['catalyst', 'keywords', keywords.join(', ')]);

  setColumnWidths(sheet, [14, 34, 40]);
}

export function buildSignalsWorkbook(
  run: SignalRunRecord,
  snapshot: MarketSnapshot,
  options: WorkbookOptions = {}
): ExcelJS.Workbook {
  const refreshedAt = options.refreshedAt ?? new Date();
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'signal-ranker';
  workbook.created = refreshedAt;

  addDashboardSheet(workbook, run, refreshedAt);
  addSignalsSheet(workbook, run);
  addNewsSheet(workbook, run, snapshot);
  addParametersSheet(workbook, run);

  return workbook;
}

export function getExportFilename(runId: string): string {
  return `signals_${runId}.xlsx`;
}

export async function writeSignalsWorkbook(
  run: SignalRunRecord,
  snapshot: MarketSnapshot,
  outputDir: string,
  options: WorkbookOptions = {}
): Promise<string> {
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }

  const filePath = join(outputDir, getExportFilename(run.run_id));
  await buildSignalsWorkbook(run, snapshot, options).xlsx.writeFile(filePath);

  logger.info({ runId: run.run_id, filePath }, 'Signals workbook written');
  return filePath;
}
