/**
 * Market Overview Hook
 *
 * Loads index levels and quotes for the market universe once, and derives sector performance,
 * breadth and top movers from them. Tickers that fail are listed in `failedTickers`.
 */

import { useState, useEffect, useCallback, useMemo } from 'react';
import type {
  IndexSnapshot,
  MarketBreadth,
  QuoteSnapshot,
  SectorPerformance,
} from '../types';
import type { AppConfig } from '../config';
import { fetchQuotes, getMarketOverview, type MarketDataProvider } from '../services/marketDataService';
import {
  calculateMarketBreadth,
  calculateSectorPerformance,
  findTopMovers,
  MARKET_UNIVERSE,
} from '../services/screeningService';

export interface UseMarketOverviewProps {
  provider: MarketDataProvider;
  config: AppConfig;
}

export interface UseMarketOverviewResult {
  indices: IndexSnapshot[];
  /** Every quote that loaded, keyed by ticker */
  quotes: Map<string, QuoteSnapshot>;
  sectors: SectorPerformance[];
  breadth: MarketBreadth;
  topMovers: QuoteSnapshot[];
  failedTickers: string[];
  isLoading: boolean;
  refresh: () => void;
}

const universeTickers = (): string[] =>
  Array.from(new Set([
    ...MARKET_UNIVERSE.screening,
    ...Object.values(MARKET_UNIVERSE.sectors).flat(),
    ...MARKET_UNIVERSE.movers,
  ]));

export const useMarketOverview = ({ provider, config }: UseMarketOverviewProps): UseMarketOverviewResult => {
  const [indices, setIndices] = useState<IndexSnapshot[]>([]);
  const [quotes, setQuotes] = useState<Map<string, QuoteSnapshot>>(new Map());
  const [failedTickers, setFailedTickers] = useState<string[]>([]);
  const [isLoading, setIsLoading] = useState(false);
  const [refreshToken, setRefreshToken] = useState(0);

  useEffect(() => {
    let cancelled = false;

    const loadMarket = async () => {
      setIsLoading(true);
      try {
        const [overview, batch] = await Promise.all([
          getMarketOverview(provider, MARKET_UNIVERSE.indices, config.providerTimeoutMs),
          fetchQuotes(provider, universeTickers(), config.providerTimeoutMs),
        ]);
        if (cancelled) return;

        setIndices(overview);
        setQuotes(batch.succeeded);
        setFailedTickers(batch.failed.map((failure) => failure.ticker));
        console.log(`📊 Loaded ${batch.succeeded.size} quotes and ${overview.length} indices`);
      } catch (error) {
        console.error('❌ Failed to load market overview:', error);
      } finally {
        if (!cancelled) setIsLoading(false);
      }
    };

    void loadMarket();

    return () => {
      cancelled = true;
    };
  }, [provider, config, refreshToken]);

  const sectors = useMemo(() => calculateSectorPerformance(quotes, MARKET_UNIVERSE.sectors), [quotes]);

  const moverQuotes = useMemo(
    () => MARKET_UNIVERSE.movers
      .map((ticker) => quotes.get(ticker))
      .filter((quote): quote is QuoteSnapshot => quote !== undefined),
    [quotes]
  );

  const breadth = useMemo(() => calculateMarketBreadth(moverQuotes), [moverQuotes]);
  const topMovers = useMemo(() => findTopMovers(moverQuotes), [moverQuotes]);

  const refresh = useCallback(() => setRefreshToken((token) => token + 1), []);

  return { indices, quotes, sectors, breadth, topMovers, failedTickers, isLoading, refresh };
};
