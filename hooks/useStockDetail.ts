/**
 * Stock Detail Hook
 *
 * Quote, price history and technical indicators for one ticker.
 */

import { useEffect, useReducer } from 'react';
import type { AnalysisPeriod, IndicatorBundle, PriceSeries, QuoteSnapshot } from '../types';
import { barsToPriceSeries, withTimeout, type MarketDataProvider } from '../services/marketDataService';
import { sanitizePriceSeries } from '../services/returnAlignmentService';
import { calculateIndicators } from '../services/indicatorService';

export interface UseStockDetailProps {
  provider: MarketDataProvider;
  ticker: string | null;
  period: AnalysisPeriod;
  timeoutMs: number;
}

export interface UseStockDetailResult {
  quote: QuoteSnapshot | null;
  history: PriceSeries;
  indicators: IndicatorBundle | null;
  isLoading: boolean;
  error: string | null;
}

export type StockDetailAction =
  | { type: 'cleared' }
  | { type: 'started' }
  | { type: 'loaded'; quote: QuoteSnapshot; history: PriceSeries; indicators: IndicatorBundle }
  | { type: 'failed'; error: string };

export const INITIAL_STOCK_DETAIL: UseStockDetailResult = {
  quote: null,
  history: [],
  indicators: null,
  isLoading: false,
  error: null,
};

export function stockDetailReducer(state: UseStockDetailResult, action: StockDetailAction): UseStockDetailResult {
  switch (action.type) {
    case 'cleared':
      return INITIAL_STOCK_DETAIL;
    case 'started':
      return { ...state, isLoading: true };
    case 'loaded':
      return { quote: action.quote, history: action.history, indicators: action.indicators, isLoading: false, error: null };
    case 'failed':
      return { ...INITIAL_STOCK_DETAIL, error: action.error };
  }
}

export const useStockDetail = ({ provider, ticker, period, timeoutMs }: UseStockDetailProps): UseStockDetailResult => {
  const [state, dispatch] = useReducer(stockDetailReducer, INITIAL_STOCK_DETAIL);

  useEffect(() => {
    if (!ticker) {
      dispatch({ type: 'cleared' });
      return;
    }

    let cancelled = false;

    const loadStock = async () => {
      dispatch({ type: 'started' });
      try {
        const [snapshot, bars] = await Promise.all([
          withTimeout(ticker, timeoutMs, (signal) => provider.fetchQuote(ticker, signal)),
          withTimeout(ticker, timeoutMs, (signal) => provider.fetchHistory(ticker, period, signal)),
        ]);
        if (cancelled) return;

        const series = sanitizePriceSeries(barsToPriceSeries(bars));
        dispatch({ type: 'loaded', quote: snapshot, history: series, indicators: calculateIndicators(series) });
      } catch (err) {
        console.error(`❌ Failed to load ${ticker}:`, err);
        if (!cancelled) dispatch({ type: 'failed', error: err instanceof Error ? err.message : String(err) });
      }
    };

    void loadStock();

    return () => {
      cancelled = true;
    };
  }, [provider, ticker, period, timeoutMs]);

  return state;
};
