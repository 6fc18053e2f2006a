// Error types shared by the market data layer and the analysis engine

import type { AnalysisPeriod, TickerFailure } from './types';

const describePeriod = (period: AnalysisPeriod): string =>
  typeof period === 'string' ? period : `${period.days}d`;

/**
 * Upstream/network failure for one ticker. Absorbed per ticker, never fatal on its own.
 */
export class ProviderUnavailableError extends Error {
  readonly ticker: string;

  constructor(ticker: string, message: string, options?: { cause?: unknown }) {
    super(`${ticker}: ${message}`, options);
    this.name = 'ProviderUnavailableError';
    this.ticker = ticker;
  }
}

export class ProviderTimeoutError extends ProviderUnavailableError {
  readonly timeoutMs: number;

  constructor(ticker: string, timeoutMs: number) {
    super(ticker, `request timed out after ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The provider answered, but there is no price history for the requested window
 */
export class NoDataForPeriodError extends Error {
  readonly ticker: string;
  readonly period: AnalysisPeriod;

  constructor(ticker: string, period: AnalysisPeriod) {
    super(`${ticker}: no price history for period ${describePeriod(period)}`);
    this.name = 'NoDataForPeriodError';
    this.ticker = ticker;
    this.period = period;
  }
}

/**
 * Zero usable tickers remain. Aborts the whole computation.
 */
export class InsufficientDataError extends Error {
  readonly failures: TickerFailure[];

  constructor(message: string, failures: TickerFailure[] = []) {
    super(message);
    this.name = 'InsufficientDataError';
    this.failures = failures;
  }
}

/**
 * Benchmark and portfolio return series share no date at all
 */
export class BenchmarkOverlapError extends Error {
  readonly benchmarkTicker: string;

  constructor(benchmarkTicker: string) {
    super(`Benchmark ${benchmarkTicker} has no trading dates in common with the portfolio`);
    this.name = 'BenchmarkOverlapError';
    this.benchmarkTicker = benchmarkTicker;
  }
}

export type ScenarioErrorCode = 'NOT_FOUND' | 'DUPLICATE_NAME' | 'INVALID_INPUT';

export class ScenarioError extends Error {
  readonly code: ScenarioErrorCode;

  constructor(code: ScenarioErrorCode, message: string) {
    super(message);
    this.name = 'ScenarioError';
    this.code = code;
  }
}

/**
 * Classify a per-ticker error into the failure record surfaced to the caller
 */
export const toTickerFailure = (ticker: string, error: unknown): TickerFailure => {
  if (error instanceof NoDataForPeriodError) {
    return { ticker, kind: 'NO_DATA_FOR_PERIOD', message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { ticker, kind: 'PROVIDER_UNAVAILABLE', message };
};
