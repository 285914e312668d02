import { describe, it, expect } from 'vitest';
import { filterRejection, filterSymbols } from '@/scoring/filters';
import { DEFAULT_FILTERS } from '@/scoring/scoring_config';
import { fundamentals, observation } from '../helpers/snapshot';

describe('filterSymbols', () => {
  it('keeps symbols inside every threshold, in observation order', () => {
    const result = filterSymbols(
      { BBB: observation('BBB'), AAA: observation('AAA') },
      { AAA: fundamentals('AAA'), BBB: fundamentals('BBB') },
      DEFAULT_FILTERS
    );

    expect(result.passedSymbols).toEqual(['BBB', 'AAA']);
    expect(result.removedCount).toBe(0);
  });

  it('records the first failing reason for each symbol', () => {
    const result = filterSymbols(
      {
        CHEAP: observation('CHEAP', { price: 1.5 }),
        PRICEY: observation('PRICEY', { price: 650 }),
        THIN: observation('THIN', { volume: 100_000 }),
        SMALL: observation('SMALL'),
        WIDE: observation('WIDE'),
        NOFUND: observation('NOFUND'),
        GOOD: observation('GOOD'),
      },
      {
        CHEAP: fundamentals('CHEAP', { marketCapMillions: 10 }),
        PRICEY: fundamentals('PRICEY'),
        THIN: fundamentals('THIN'),
        SMALL: fundamentals('SMALL', { marketCapMillions: 50 }),
        WIDE: fundamentals('WIDE', { floatMillions: 900 }),
        GOOD: fundamentals('GOOD'),
      },
      DEFAULT_FILTERS
    );

    expect(result.passedSymbols).toEqual(['GOOD']);
    expect(result.removedByReason).toEqual({
      price: ['CHEAP', 'PRICEY'],
      volume: ['THIN'],
      market_cap: ['SMALL', 'NOFUND'],
      float: ['WIDE'],
    });
    expect(result.removedCount).toBe(6);
  });

  it('treats the thresholds as inclusive', () => {
    const edge = observation('EDGE', { price: 2, volume: 500_000 });
    const edgeFundamentals = fundamentals('EDGE', { marketCapMillions: 100, floatMillions: 250 });
    expect(filterRejection(edge, edgeFundamentals, DEFAULT_FILTERS)).toBeNull();
    expect(
      filterRejection(observation('TOP', { price: 500 }), fundamentals('TOP'), DEFAULT_FILTERS)
    ).toBeNull();
  });

  it('rejects a non-finite price', () => {
    expect(
      filterRejection(observation('NAN', { price: Number.NaN }), fundamentals('NAN'), DEFAULT_FILTERS)
    ).toBe('price');
  });

  it('never passes a price below minPrice whatever else it has', () => {
    const hot = observation('HOT', {
      price: 1.99,
      volume: 50_000_000,
      rsi: 5,
      percentChangeToday: 40,
    });
    const result = filterSymbols({ HOT: hot }, { HOT: fundamentals('HOT') }, DEFAULT_FILTERS);
    expect(result.passedSymbols).toEqual([]);
    expect(result.removedByReason.price).toEqual(['HOT']);
  });
});
