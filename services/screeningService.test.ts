import { describe, it, expect } from 'vitest';
import {
  MARKET_UNIVERSE,
  calculateMarketBreadth,
  calculateSectorPerformance,
  findTopMovers,
  matchesFilters,
  screenStocks,
  sectorOf,
} from './screeningService';
import { quote } from '../test/fakeMarketData';
import type { QuoteSnapshot } from '../types';

const UNIVERSE: QuoteSnapshot[] = [
  quote('MSFT', { peRatio: 35, dividendYield: 0.8, marketCap: 3.1e12, sector: 'Technology' }),
  quote('JNJ', { peRatio: 15, dividendYield: 3.0, marketCap: 3.8e11, sector: 'Healthcare' }),
  quote('AAPL', { peRatio: 29, dividendYield: 0.5, marketCap: 2.9e12, sector: 'Technology' }),
  quote('NEWCO', { sector: 'Technology' }),
  quote('XOM', { peRatio: 11, dividendYield: 3.4, marketCap: 4.5e11, sector: 'Energy' }),
];

const tickers = (snapshots: QuoteSnapshot[]): string[] => snapshots.map((s) => s.ticker);

describe('screenStocks', () => {
  it('keeps everything, sorted by ticker, when no filter is set', () => {
    expect(tickers(screenStocks(UNIVERSE, {}))).toEqual(['AAPL', 'JNJ', 'MSFT', 'NEWCO', 'XOM']);
  });

  it('applies P/E bounds inclusively and drops snapshots without a P/E', () => {
    expect(tickers(screenStocks(UNIVERSE, { minPe: 15, maxPe: 29 }))).toEqual(['AAPL', 'JNJ']);
    expect(tickers(screenStocks(UNIVERSE, { maxPe: 100 }))).not.toContain('NEWCO');
  });

  it('filters on minimum dividend yield in percent', () => {
    expect(tickers(screenStocks(UNIVERSE, { minDividendYield: 3 }))).toEqual(['JNJ', 'XOM']);
  });

  it('filters on market cap range', () => {
    expect(tickers(screenStocks(UNIVERSE, { minMarketCap: 4e11, maxMarketCap: 3e12 }))).toEqual(['AAPL', 'XOM']);
  });

  it('matches sector without regard to case', () => {
    expect(tickers(screenStocks(UNIVERSE, { sector: 'technology' }))).toEqual(['AAPL', 'MSFT', 'NEWCO']);
  });

  it('combines every filter', () => {
    expect(tickers(screenStocks(UNIVERSE, { sector: 'Technology', maxPe: 30 }))).toEqual(['AAPL']);
  });

  it('ignores a blank sector', () => {
    expect(matchesFilters(quote('ANY'), { sector: '  ' })).toBe(true);
  });
});

describe('sectorOf', () => {
  it('finds the listed sector of a ticker', () => {
    expect(sectorOf(' aapl ')).toBe('Technology');
    expect(sectorOf('ZZZZ')).toBeNull();
    expect(sectorOf('X', { Energy: ['X'] })).toBe('Energy');
  });
});

describe('calculateSectorPerformance', () => {
  it('averages quoted tickers per sector, best first, and skips empty sectors', () => {
    const snapshots = new Map([
      ['AAA', quote('AAA', { changePercent: 2 })],
      ['BBB', quote('BBB', { changePercent: -1 })],
      ['CCC', quote('CCC', { changePercent: -3 })],
    ]);

    const performance = calculateSectorPerformance(snapshots, {
      Alpha: ['AAA', 'BBB', 'MISSING'],
      Beta: ['ccc'],
      Gamma: ['NONE'],
    });

    expect(performance).toEqual([
      { sector: 'Alpha', averageChangePercent: 0.5, sampleSize: 2 },
      { sector: 'Beta', averageChangePercent: -3, sampleSize: 1 },
    ]);
  });
});

describe('calculateMarketBreadth', () => {
  const withChanges = (changes: number[]): QuoteSnapshot[] =>
    changes.map((changePercent, i) => quote(`T${i}`, { changePercent }));

  it('counts advancing, declining and unchanged quotes', () => {
    expect(calculateMarketBreadth(withChanges([1, -1, 0, 2]))).toEqual({
      advancing: 2,
      declining: 1,
      unchanged: 1,
      sentiment: 'BULLISH',
    });
  });

  it('is strongly bullish at 80% advancing', () => {
    expect(calculateMarketBreadth(withChanges([1, 1, 1, 1, 1, 1, 1, 1, -1, 0])).sentiment).toBe('STRONG_BULLISH');
  });

  it('is strongly bearish at 80% declining', () => {
    expect(calculateMarketBreadth(withChanges([-1, -1, -1, -1, -1, -1, -1, -1, 1, 0])).sentiment).toBe('STRONG_BEARISH');
  });

  it('is bearish below the strong threshold', () => {
    expect(calculateMarketBreadth(withChanges([-1, -1, -1, 1, 0])).sentiment).toBe('BEARISH');
  });

  it('is mixed on a tie or an empty market', () => {
    expect(calculateMarketBreadth(withChanges([1, -1])).sentiment).toBe('MIXED');
    expect(calculateMarketBreadth([])).toEqual({ advancing: 0, declining: 0, unchanged: 0, sentiment: 'MIXED' });
  });
});

describe('findTopMovers', () => {
  const snapshots = [
    quote('FLAT', { changePercent: 1 }),
    quote('UP', { changePercent: 4.5 }),
    quote('DOWN', { changePercent: -6 }),
    quote('SMALL', { changePercent: 1.2 }),
    quote('TIE', { changePercent: -4.5 }),
  ];

  it('keeps moves beyond the threshold, largest first', () => {
    expect(tickers(findTopMovers(snapshots))).toEqual(['DOWN', 'TIE', 'UP', 'SMALL']);
  });

  it('honours the limit', () => {
    expect(tickers(findTopMovers(snapshots, { limit: 2 }))).toEqual(['DOWN', 'TIE']);
  });

  it('honours a custom threshold', () => {
    expect(tickers(findTopMovers(snapshots, { minAbsChangePercent: 5 }))).toEqual(['DOWN']);
  });
});

describe('MARKET_UNIVERSE', () => {
  it('lists the benchmark among the indices and five tickers per sector', () => {
    expect(MARKET_UNIVERSE.indices.map((index) => index.ticker)).toContain('^GSPC');
    for (const sectorTickers of Object.values(MARKET_UNIVERSE.sectors)) {
      expect(sectorTickers).toHaveLength(5);
    }
  });
});
