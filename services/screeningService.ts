// ============================================================================
// MARKET SCREENING
// ============================================================================
// Filters quote snapshots by fundamentals and summarizes the day's market:
// sector averages, breadth and the biggest movers.
//
// A snapshot that does not report a value never passes a bound on that value.
// ============================================================================

import type {
  MarketBreadth,
  MarketSentiment,
  MarketUniverse,
  QuoteSnapshot,
  ScreeningFilters,
  SectorPerformance,
} from '../types';
import universeData from '../data/marketUniverse.json';

export const MARKET_UNIVERSE: MarketUniverse = universeData;

/**
 * Sector a ticker is listed under in the universe, or null when it is not listed
 */
export function sectorOf(
  ticker: string,
  sectorUniverse: Record<string, string[]> = MARKET_UNIVERSE.sectors
): string | null {
  const symbol = ticker.trim().toUpperCase();
  for (const [sector, tickers] of Object.entries(sectorUniverse)) {
    if (tickers.includes(symbol)) return sector;
  }
  return null;
}

const STRONG_SENTIMENT_SHARE = 0.7;

const compareTickers = (a: QuoteSnapshot, b: QuoteSnapshot): number =>
  a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0;

const withinBounds = (value: number | null, min: number | undefined, max: number | undefined): boolean => {
  if (min === undefined && max === undefined) return true;
  if (value === null) return false;
  if (min !== undefined && value < min) return false;
  if (max !== undefined && value > max) return false;
  return true;
};

/**
 * Does one snapshot satisfy every supplied filter?
 */
export function matchesFilters(snapshot: QuoteSnapshot, filters: ScreeningFilters): boolean {
  if (!withinBounds(snapshot.peRatio, filters.minPe, filters.maxPe)) return false;
  if (!withinBounds(snapshot.dividendYield, filters.minDividendYield, undefined)) return false;
  if (!withinBounds(snapshot.marketCap, filters.minMarketCap, filters.maxMarketCap)) return false;

  if (filters.sector !== undefined && filters.sector.trim() !== '') {
    if (snapshot.sector === null) return false;
    if (snapshot.sector.trim().toLowerCase() !== filters.sector.trim().toLowerCase()) return false;
  }

  return true;
}

/**
 * Snapshots satisfying all filters, sorted by ticker
 */
export function screenStocks(snapshots: Iterable<QuoteSnapshot>, filters: ScreeningFilters): QuoteSnapshot[] {
  return Array.from(snapshots)
    .filter((snapshot) => matchesFilters(snapshot, filters))
    .sort(compareTickers);
}

/**
 * Average day change per sector over the tickers that have a quote.
 * Sectors with no quoted ticker are left out. Sorted best first.
 */
export function calculateSectorPerformance(
  snapshots: ReadonlyMap<string, QuoteSnapshot>,
  sectorUniverse: Record<string, string[]> = MARKET_UNIVERSE.sectors
): SectorPerformance[] {
  const performance: SectorPerformance[] = [];

  for (const [sector, tickers] of Object.entries(sectorUniverse)) {
    const changes = tickers
      .map((ticker) => snapshots.get(ticker.toUpperCase()))
      .filter((quote): quote is QuoteSnapshot => quote !== undefined)
      .map((quote) => quote.changePercent);

    if (changes.length === 0) continue;

    performance.push({
      sector,
      averageChangePercent: changes.reduce((sum, change) => sum + change, 0) / changes.length,
      sampleSize: changes.length,
    });
  }

  return performance.sort((a, b) => b.averageChangePercent - a.averageChangePercent);
}

const classifySentiment = (advancing: number, declining: number, total: number): MarketSentiment => {
  if (total === 0) return 'MIXED';
  if (advancing > declining) {
    return advancing >= STRONG_SENTIMENT_SHARE * total ? 'STRONG_BULLISH' : 'BULLISH';
  }
  if (declining > advancing) {
    return declining >= STRONG_SENTIMENT_SHARE * total ? 'STRONG_BEARISH' : 'BEARISH';
  }
  return 'MIXED';
};

/**
 * Advancing / declining / unchanged counts and the overall sentiment
 */
export function calculateMarketBreadth(snapshots: Iterable<QuoteSnapshot>): MarketBreadth {
  let advancing = 0;
  let declining = 0;
  let unchanged = 0;

  for (const snapshot of snapshots) {
    if (snapshot.changePercent > 0) advancing++;
    else if (snapshot.changePercent < 0) declining++;
    else unchanged++;
  }

  return {
    advancing,
    declining,
    unchanged,
    sentiment: classifySentiment(advancing, declining, advancing + declining + unchanged),
  };
}

export interface TopMoversOptions {
  limit?: number;
  minAbsChangePercent?: number;
}

/**
 * Biggest moves of the day in either direction
 */
export function findTopMovers(
  snapshots: Iterable<QuoteSnapshot>,
  { limit = 8, minAbsChangePercent = 1 }: TopMoversOptions = {}
): QuoteSnapshot[] {
  return Array.from(snapshots)
    .filter((snapshot) => Math.abs(snapshot.changePercent) > minAbsChangePercent)
    .sort((a, b) => Math.abs(b.changePercent) - Math.abs(a.changePercent) || compareTickers(a, b))
    .slice(0, limit);
}
