import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { InputShapeError } from '@/core/errors';
import { loadMarketSnapshot, parseMarketSnapshot } from '@/data/snapshot_loader';

const rawSnapshot = {
  as_of: '2026-03-06T21:00:00Z',
  observations: {
    abc: { price: 12.5, volume: 800000, avg_volume_20d: 600000, rsi: 61.2, atr: 0.5, pct_change: 1.4 },
    DEF: { price: 40, volume: 1200000 },
  },
  news: {
    ABC: [{ headline: 'ABC signs partnership', sentiment: 'Positive', source: 'Wire' }],
  },
  fundamentals: {
    ABC: { market_cap_millions: 900, float_millions: 80, pe_ratio: 21 },
    DEF: { market_cap_millions: null },
  },
  sector_quotes: {
    xlk: { pct_change: 0.8 },
  },
};

describe('market snapshot loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'snapshot-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('maps the file onto camelCase records keyed by upper-case ticker', () => {
    const snapshot = parseMarketSnapshot(rawSnapshot);

    expect(snapshot.asOf).toBe('2026-03-06T21:00:00Z');
    expect(snapshot.observations.ABC).toEqual({
      ticker: 'ABC',
      price: 12.5,
      volume: 800000,
      averageVolume20Day: 600000,
      rsi: 61.2,
      atr: 0.5,
      percentChangeToday: 1.4,
    });
    expect(snapshot.news.ABC).toEqual([
      {
        ticker: 'ABC',
        headline: 'ABC signs partnership',
        sentiment: 'Positive',
        source: 'Wire',
        timestamp: '',
      },
    ]);
    expect(snapshot.sectorQuotes.XLK).toEqual({ sectorSymbol: 'XLK', percentChangeToday: 0.8 });
  });

  it('fills missing observation and fundamental fields with defaults', () => {
    const snapshot = parseMarketSnapshot(rawSnapshot);

    expect(snapshot.observations.DEF).toEqual({
      ticker: 'DEF',
      price: 40,
      volume: 1200000,
      averageVolume20Day: 0,
      rsi: null,
      atr: 0,
      percentChangeToday: 0,
    });
    expect(snapshot.fundamentals.DEF).toEqual({
      ticker: 'DEF',
      marketCapMillions: 0,
      floatMillions: 0,
      peRatio: null,
    });
  });

  it('freezes the loaded snapshot', () => {
    const snapshot = parseMarketSnapshot(rawSnapshot);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.observations)).toBe(true);
    expect(Object.isFrozen(snapshot.observations.ABC)).toBe(true);
  });

  it('keeps the first of two tickers that differ only in case', () => {
    const snapshot = parseMarketSnapshot({
      ...rawSnapshot,
      observations: {
        xyz: { price: 20, volume: 2000000 },
        XYZ: { price: 99, volume: 1 },
      },
      sector_quotes: { xlk: { pct_change: 0.8 }, XLK: { pct_change: -3 } },
    });
    expect(Object.keys(snapshot.observations)).toEqual(['XYZ']);
    expect(snapshot.observations.XYZ.price).toBe(20);
    expect(snapshot.sectorQuotes.XLK.percentChangeToday).toBe(0.8);
  });

  it('rejects a snapshot missing a mapping', () => {
    const { news: _news, ...withoutNews } = rawSnapshot;
    expect(() => parseMarketSnapshot(withoutNews)).toThrow(InputShapeError);
    expect(() => parseMarketSnapshot(withoutNews)).toThrow(/must have required property 'news'/);
  });

  it('rejects an unknown sentiment label', () => {
    const bad = {
      ...rawSnapshot,
      news: { ABC: [{ headline: 'ABC', sentiment: 'Bullish' }] },
    };
    expect(() => parseMarketSnapshot(bad)).toThrow(/\/news\/ABC\/0\/sentiment/);
  });

  it('loads from disk', () => {
    const path = join(tempDir, 'snapshot.json');
    writeFileSync(path, JSON.stringify(rawSnapshot));
    const snapshot = loadMarketSnapshot(path);
    expect(Object.keys(snapshot.observations)).toEqual(['ABC', 'DEF']);
  });

  it('reports a missing or unreadable file as an input error', () => {
    expect(() => loadMarketSnapshot(join(tempDir, 'missing.json'))).toThrow(
      /market snapshot not found/
    );
    const path = join(tempDir, 'broken.json');
    writeFileSync(path, '[');
    expect(() => loadMarketSnapshot(path)).toThrow(InputShapeError);
  });
});
