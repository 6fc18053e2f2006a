import { describe, it, expect } from 'vitest';
import { INITIAL_ANALYSIS_STATE, analysisReducer } from './usePortfolioAnalysis';
import type { PortfolioAnalysis } from '../types';

const analysis: PortfolioAnalysis = {
  scenarioId: 'scenario-1',
  scenarioName: 'Core',
  period: '1y',
  performance: {
    totalReturnPct: 5,
    annualizedReturnPct: 5,
    volatilityPct: 10,
    sharpeRatio: 0.3,
    maxDrawdownPct: -2,
    drawdownPeriod: null,
    beta: { status: 'unavailable', reason: 'INSUFFICIENT_OVERLAP', message: 'Too few overlapping days' },
    correlation: { status: 'unavailable', reason: 'INSUFFICIENT_OVERLAP', message: 'Too few overlapping days' },
    cumulativeSeries: [],
    initialCapital: 1_000,
    finalValue: 1_050,
    absoluteGain: 50,
    observations: 10,
  },
  benchmark: null,
  comparison: null,
  holdings: [],
  excluded: [],
  degraded: false,
  computedAt: '2024-03-05T10:00:00.000Z',
};

describe('analysisReducer', () => {
  it('stops loading when the scenario is cleared mid-run', () => {
    const loading = analysisReducer(INITIAL_ANALYSIS_STATE, { type: 'started' });
    expect(loading.isLoading).toBe(true);

    expect(analysisReducer(loading, { type: 'cleared' })).toEqual({ analysis: null, isLoading: false, error: null });
  });

  it('keeps the previous analysis on screen while recomputing', () => {
    const done = analysisReducer(INITIAL_ANALYSIS_STATE, { type: 'succeeded', analysis });

    expect(analysisReducer(done, { type: 'started' })).toEqual({ analysis, isLoading: true, error: null });
  });

  it('replaces the analysis with the error on failure', () => {
    const loading = analysisReducer({ analysis, isLoading: false, error: null }, { type: 'started' });

    expect(analysisReducer(loading, { type: 'failed', error: 'Benchmark unavailable' })).toEqual({
      analysis: null,
      isLoading: false,
      error: 'Benchmark unavailable',
    });
  });
});
