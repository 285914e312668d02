/**
 * Ticker to sector benchmark (sector ETF) lookup
 */

import { existsSync, readFileSync } from 'fs';
import { getEnvConfig } from '@/core/env';
import { createChildLogger } from '@/utils/logger';
import { ConfigError, describeError } from '@/core/errors';
import type { MarketSnapshot } from '@/types/signals';
import { validateSectorMapFile } from '@/validation/ajv_instance';

const logger = createChildLogger('sector_map');

export const DEFAULT_SECTOR = 'XLK';

export interface SectorCoverage {
  unmapped: string[];
  missingQuotes: string[];
}

export class SectorMap {
  private readonly byTicker: ReadonlyMap<string, string>;
  readonly defaultSector: string;

  constructor(entries: Record<string, string> = {}, defaultSector: string = DEFAULT_SECTOR) {
    const map = new Map<string, string>();
    for (const [ticker, sector] of Object.entries(entries)) {
      map.set(normalizeTicker(ticker), sector);
    }
    this.byTicker = map;
    this.defaultSector = defaultSector;
  }

  /** Build from a sector -> tickers table; a ticker listed twice keeps its first sector */
  static fromSectorTable(
    sectors: Record<string, readonly string[]>,
    defaultSector: string = DEFAULT_SECTOR
  ): SectorMap {
    const entries: Record<string, string> = {};
    for (const [sector, tickers] of Object.entries(sectors)) {
      for (const ticker of tickers) {
        const key = normalizeTicker(ticker);
        if (!(key in entries)) entries[key] = sector;
      }
    }
    return new SectorMap(entries, defaultSector);
  }

  resolve(ticker: string): string {
    return this.byTicker.get(normalizeTicker(ticker)) ?? this.defaultSector;
  }

  has(ticker: string): boolean {
    return this.byTicker.has(normalizeTicker(ticker));
  }

  /**
   * Observed tickers with no entry of their own, and the sectors they resolve
   * to that have no quote in the snapshot (scored as a 0% sector move).
   */
  coverage(snapshot: MarketSnapshot): SectorCoverage {
    const unmapped: string[] = [];
    const missingQuotes = new Set<string>();
    for (const ticker of Object.keys(snapshot.observations)) {
      if (!this.has(ticker)) unmapped.push(ticker);
      const sector = this.resolve(ticker);
      if (!(sector in snapshot.sectorQuotes)) missingQuotes.add(sector);
    }
    return { unmapped, missingQuotes: [...missingQuotes].sort() };
  }

  get size(): number {
    return this.byTicker.size;
  }
}

function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

/**
 * Load the sector table from JSON. A missing file leaves every ticker on the
 * default sector.
 */
export function loadSectorMap(
  path: string = getEnvConfig().sectorMapPath
): SectorMap {
  if (!existsSync(path)) {
    logger.warn({ path }, 'Sector map not found, all tickers use the default sector');
    return new SectorMap({}, DEFAULT_SECTOR);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`sector map is not valid JSON: ${path}`, [describeError(error)]);
  }

  const result = validateSectorMapFile(raw);
  if (!result.valid || !result.data) {
    throw new ConfigError(`sector map invalid: ${path}`, result.errors ?? []);
  }
  const parsed = result.data;
  const sectorMap = SectorMap.fromSectorTable(
    parsed.sectors ?? {},
    parsed.default_sector ?? DEFAULT_SECTOR
  );
  logger.debug({ path, tickers: sectorMap.size }, 'Sector map loaded');
  return sectorMap;
}
