/**
 * Portfolio Analysis Hook
 *
 * Recomputes the analysis whenever the selected scenario changes. Only the result of the most
 * recent request is applied, so switching scenarios quickly never shows a stale analysis.
 */

import { useState, useEffect, useCallback, useReducer } from 'react';
import type { PortfolioAnalysis, PortfolioScenario } from '../types';
import type { AppConfig } from '../config';
import type { HistoryProvider } from '../services/marketDataService';
import { analyzeScenario } from '../services/portfolioAnalysisService';

export interface UsePortfolioAnalysisProps {
  scenario: PortfolioScenario | null;
  provider: HistoryProvider;
  config: AppConfig;
}

export interface UsePortfolioAnalysisResult {
  /** Latest analysis of the scenario, null before the first result */
  analysis: PortfolioAnalysis | null;
  isLoading: boolean;
  /** Message of the error that aborted the last computation */
  error: string | null;
  /** Recompute with the same inputs */
  refresh: () => void;
}

export interface AnalysisState {
  analysis: PortfolioAnalysis | null;
  isLoading: boolean;
  error: string | null;
}

export type AnalysisAction =
  | { type: 'cleared' }
  | { type: 'started' }
  | { type: 'succeeded'; analysis: PortfolioAnalysis }
  | { type: 'failed'; error: string };

export const INITIAL_ANALYSIS_STATE: AnalysisState = { analysis: null, isLoading: false, error: null };

export function analysisReducer(state: AnalysisState, action: AnalysisAction): AnalysisState {
  switch (action.type) {
    case 'cleared':
      return INITIAL_ANALYSIS_STATE;
    case 'started':
      return { ...state, isLoading: true };
    case 'succeeded':
      return { analysis: action.analysis, isLoading: false, error: null };
    case 'failed':
      return { analysis: null, isLoading: false, error: action.error };
  }
}

/**
 * @example
 * ```tsx
 * const { analysis, isLoading, error } = usePortfolioAnalysis({ scenario: activeScenario, provider, config });
 * ```
 */
export const usePortfolioAnalysis = ({
  scenario,
  provider,
  config,
}: UsePortfolioAnalysisProps): UsePortfolioAnalysisResult => {
  const [state, dispatch] = useReducer(analysisReducer, INITIAL_ANALYSIS_STATE);
  const [refreshToken, setRefreshToken] = useState(0);

  useEffect(() => {
    if (!scenario || scenario.holdings.length === 0) {
      // Also ends the spinner of a run that this change cancelled
      dispatch({ type: 'cleared' });
      return;
    }

    let cancelled = false;

    const runAnalysis = async () => {
      dispatch({ type: 'started' });
      try {
        const result = await analyzeScenario(scenario, { provider, config });
        if (!cancelled) dispatch({ type: 'succeeded', analysis: result });
      } catch (err) {
        console.error('❌ Portfolio analysis failed:', err);
        if (!cancelled) dispatch({ type: 'failed', error: err instanceof Error ? err.message : String(err) });
      }
    };

    void runAnalysis();

    return () => {
      cancelled = true;
    };
  }, [scenario, provider, config, refreshToken]);

  const refresh = useCallback(() => setRefreshToken((token) => token + 1), []);

  return { ...state, refresh };
};
