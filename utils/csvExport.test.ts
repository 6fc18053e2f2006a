import { describe, it, expect } from 'vitest';
import {
  escapeCSVValue,
  generateExportFilename,
  generatePerformanceCSV,
  performanceToExportRows,
} from './csvExport';
import type { PerformanceResult, PortfolioAnalysis } from '../types';

const performance: PerformanceResult = {
  totalReturnPct: 16.2834,
  annualizedReturnPct: 25.5,
  volatilityPct: 12.3456,
  sharpeRatio: 1.234,
  maxDrawdownPct: -3.1,
  drawdownPeriod: { peakDate: '2024-02-01', troughDate: '2024-02-09' },
  beta: { status: 'available', value: 1.1 },
  correlation: { status: 'unavailable', reason: 'ZERO_VARIANCE', message: 'Benchmark returns have zero variance' },
  cumulativeSeries: [],
  initialCapital: 10_000,
  finalValue: 11_628.34,
  absoluteGain: 1_628.34,
  observations: 250,
};

const analysis: PortfolioAnalysis = {
  scenarioId: 'scenario-1',
  scenarioName: 'Growth & Income',
  period: '1y',
  performance,
  benchmark: {
    ticker: '^GSPC',
    name: 'S&P 500',
    performance: { ...performance, totalReturnPct: 3.02 },
  },
  comparison: { outperformancePct: 13.2634, riskAdjustedOutperformance: 0.4 },
  holdings: [],
  excluded: [
    { ticker: 'C', kind: 'PROVIDER_UNAVAILABLE', message: 'C: HTTP 503' },
    { ticker: 'D', kind: 'NO_DATA_FOR_PERIOD', message: 'D: no price history for period 1y' },
  ],
  degraded: true,
  computedAt: '2024-03-05T10:00:00.000Z',
};

describe('escapeCSVValue', () => {
  it('quotes values with separators, quotes or newlines', () => {
    expect(escapeCSVValue('a,b')).toBe('"a,b"');
    expect(escapeCSVValue('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCSVValue('two\nlines')).toBe('"two\nlines"');
  });

  it('passes plain values through and blanks missing ones', () => {
    expect(escapeCSVValue('+16.28%')).toBe('+16.28%');
    expect(escapeCSVValue(42)).toBe('42');
    expect(escapeCSVValue(null)).toBe('');
    expect(escapeCSVValue(undefined)).toBe('');
  });
});

describe('performanceToExportRows', () => {
  it('lists every summary metric in display order', () => {
    expect(performanceToExportRows(analysis)).toEqual([
      { metric: 'Initial Investment', value: '10000.00' },
      { metric: 'Final Value', value: '11628.34' },
      { metric: 'Absolute Gain', value: '1628.34' },
      { metric: 'Total Return', value: '+16.28%' },
      { metric: 'Annualized Return', value: '+25.50%' },
      { metric: 'Volatility', value: '+12.35%' },
      { metric: 'Sharpe Ratio', value: '+1.23' },
      { metric: 'Max Drawdown', value: '-3.10%' },
      { metric: 'Beta', value: '+1.10' },
      { metric: 'Correlation', value: 'N/A' },
      { metric: 'Benchmark Return', value: '+3.02%' },
      { metric: 'Outperformance', value: '+13.26%' },
      { metric: 'Excluded Holdings', value: 'C (HTTP 503); D (no price history for period 1y)' },
    ]);
  });

  it('marks benchmark rows unavailable when there is no benchmark', () => {
    const rows = performanceToExportRows({ ...analysis, benchmark: null, comparison: null, excluded: [] });

    expect(rows.slice(-3)).toEqual([
      { metric: 'Benchmark Return', value: 'N/A' },
      { metric: 'Outperformance', value: 'N/A' },
      { metric: 'Excluded Holdings', value: 'None' },
    ]);
  });
});

describe('generatePerformanceCSV', () => {
  it('writes a header and one escaped line per row', () => {
    const csv = generatePerformanceCSV([
      { metric: 'Total Return', value: '+16.28%' },
      { metric: 'Note', value: 'a,b' },
    ]);

    expect(csv).toBe('Metric,Value\nTotal Return,+16.28%\nNote,"a,b"');
  });
});

describe('generateExportFilename', () => {
  const date = new Date(Date.UTC(2024, 2, 5));

  it('slugs the scenario name and appends the UTC date', () => {
    expect(generateExportFilename('Growth & Income', date)).toBe('Growth_Income_analysis_20240305.csv');
    expect(generateExportFilename('My Portfolio!', date)).toBe('My_Portfolio_analysis_20240305.csv');
  });

  it('falls back to a default name', () => {
    expect(generateExportFilename('  ', date)).toBe('portfolio_analysis_20240305.csv');
  });
});
