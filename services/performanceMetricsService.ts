// ============================================================================
// PERFORMANCE METRICS SERVICE
// ============================================================================
// Computes cumulative return, annualized return, volatility, Sharpe ratio,
// maximum drawdown, beta and correlation from a daily return series.
//
// CONVENTIONS:
// 1. Volatility uses the SAMPLE standard deviation (n - 1), annualized by √252
// 2. Sharpe is 0 (not NaN) when volatility is 0
// 3. Beta/correlation use an INNER join on dates with the benchmark and are
//    reported as unavailable, never defaulted, when they cannot be computed
// 4. Drawdown tracks the peak index explicitly during forward iteration
// ============================================================================

import type {
  DrawdownPeriod,
  IsoDate,
  MetricValue,
  PerformanceResult,
  ReturnSeries,
  ValuePoint,
} from '../types';
import { InsufficientDataError } from '../errors';

// ============================================================================
// CONSTANTS
// ============================================================================

export const TRADING_DAYS_PER_YEAR = 252;

/**
 * Variances at or below this are treated as zero (floating-point noise on constant series)
 */
const ZERO_VARIANCE_TOLERANCE = 1e-20;

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

/**
 * Sample variance (n - 1 denominator). 0 for fewer than 2 values.
 */
export function sampleVariance(values: number[]): number {
  if (values.length < 2) return 0;

  const avg = mean(values);
  const sumSquares = values.reduce((sum, val) => sum + (val - avg) ** 2, 0);
  const variance = sumSquares / (values.length - 1);

  return variance <= ZERO_VARIANCE_TOLERANCE ? 0 : variance;
}

export function sampleStandardDeviation(values: number[]): number {
  return Math.sqrt(sampleVariance(values));
}

/**
 * Sample covariance between two equally long series
 */
export function sampleCovariance(series1: number[], series2: number[]): number {
  if (series1.length !== series2.length) {
    throw new RangeError(`Series lengths differ (${series1.length} vs ${series2.length})`);
  }
  if (series1.length < 2) return 0;

  const mean1 = mean(series1);
  const mean2 = mean(series2);

  let cov = 0;
  for (let i = 0; i < series1.length; i++) {
    cov += (series1[i] - mean1) * (series2[i] - mean2);
  }

  return cov / (series1.length - 1);
}

// ============================================================================
// RETURN METRICS
// ============================================================================

/**
 * Growth of 1.0 through the return series: cum[i] = Π(1 + r[0..i]).
 * The implicit starting value of 1.0 sits before the first dated return.
 */
export function calculateCumulativeSeries(returns: ReturnSeries): ValuePoint[] {
  const cumulative: ValuePoint[] = [];
  let growth = 1;
  for (const point of returns) {
    growth *= 1 + point.value;
    cumulative.push({ date: point.date, value: growth });
  }
  return cumulative;
}

/**
 * Total return in percent from a cumulative growth series
 */
export function calculateTotalReturnPct(cumulative: ValuePoint[]): number {
  if (cumulative.length === 0) return 0;
  return (cumulative[cumulative.length - 1].value - 1) * 100;
}

/**
 * Geometric annualization: ((1 + total) ^ (252 / n) - 1) * 100
 *
 * @param observations - Number of daily return observations (n)
 * @throws InsufficientDataError when there are no observations
 */
export function calculateAnnualizedReturnPct(
  totalReturnPct: number,
  observations: number,
  tradingDaysPerYear: number = TRADING_DAYS_PER_YEAR
): number {
  if (observations <= 0) {
    throw new InsufficientDataError('Cannot annualize a return over zero observations');
  }
  return (Math.pow(1 + totalReturnPct / 100, tradingDaysPerYear / observations) - 1) * 100;
}

/**
 * Annualized volatility in percent: sample stddev * √(trading days) * 100
 */
export function calculateAnnualizedVolatilityPct(
  returns: number[],
  tradingDaysPerYear: number = TRADING_DAYS_PER_YEAR
): number {
  if (returns.length < 2) return 0;
  return sampleStandardDeviation(returns) * Math.sqrt(tradingDaysPerYear) * 100;
}

/**
 * Annualized return over annualized volatility.
 * Defined as 0 when volatility is 0 so the display never shows NaN/Infinity.
 */
export function calculateSharpeRatio(
  annualizedReturnPct: number,
  volatilityPct: number,
  riskFreeRate: number = 0
): number {
  if (volatilityPct <= 0) return 0;
  return (annualizedReturnPct / 100 - riskFreeRate) / (volatilityPct / 100);
}

// ============================================================================
// MAXIMUM DRAWDOWN
// ============================================================================

/**
 * Largest peak-to-trough decline of the cumulative series, in percent (always <= 0).
 * The running peak starts at the first cumulative value.
 */
export function calculateMaxDrawdown(cumulative: ValuePoint[]): {
  maxDrawdownPct: number;
  drawdownPeriod: DrawdownPeriod | null;
} {
  if (cumulative.length === 0) {
    return { maxDrawdownPct: 0, drawdownPeriod: null };
  }

  let runningPeak = cumulative[0].value;
  let runningPeakIndex = 0;
  let maxDD = 0;
  let maxDDPeakIndex = 0;
  let maxDDTroughIndex = 0;

  for (let i = 0; i < cumulative.length; i++) {
    const value = cumulative[i].value;

    if (value > runningPeak) {
      runningPeak = value;
      runningPeakIndex = i;
    }

    const currentDD = runningPeak > 0 ? (value - runningPeak) / runningPeak : 0;

    if (currentDD < maxDD) {
      maxDD = currentDD;
      maxDDPeakIndex = runningPeakIndex;
      maxDDTroughIndex = i;
    }
  }

  if (maxDD === 0) {
    return { maxDrawdownPct: 0, drawdownPeriod: null };
  }

  return {
    maxDrawdownPct: maxDD * 100,
    drawdownPeriod: {
      peakDate: cumulative[maxDDPeakIndex].date,
      troughDate: cumulative[maxDDTroughIndex].date,
    },
  };
}

// ============================================================================
// BENCHMARK-RELATIVE METRICS
// ============================================================================

/**
 * Inner join of two return series: only dates present in both contribute
 */
export function alignReturnPairs(
  portfolio: ReturnSeries,
  benchmark: ReturnSeries
): { dates: IsoDate[]; portfolio: number[]; benchmark: number[] } {
  const benchmarkByDate = new Map(benchmark.map((point) => [point.date, point.value]));

  const dates: IsoDate[] = [];
  const portfolioValues: number[] = [];
  const benchmarkValues: number[] = [];

  for (const point of portfolio) {
    const benchmarkValue = benchmarkByDate.get(point.date);
    if (benchmarkValue === undefined) continue;
    dates.push(point.date);
    portfolioValues.push(point.value);
    benchmarkValues.push(benchmarkValue);
  }

  return { dates, portfolio: portfolioValues, benchmark: benchmarkValues };
}

const insufficientOverlap = (commonDates: number): MetricValue => ({
  status: 'unavailable',
  reason: 'INSUFFICIENT_OVERLAP',
  message: `Needs at least 2 dates in common with the benchmark, found ${commonDates}`,
});

/**
 * Beta = cov(portfolio, benchmark) / var(benchmark) over common dates
 */
export function calculateBeta(portfolio: ReturnSeries, benchmark: ReturnSeries): MetricValue {
  const aligned = alignReturnPairs(portfolio, benchmark);
  if (aligned.dates.length < 2) {
    return insufficientOverlap(aligned.dates.length);
  }

  const benchmarkVariance = sampleVariance(aligned.benchmark);
  if (benchmarkVariance === 0) {
    return {
      status: 'unavailable',
      reason: 'ZERO_VARIANCE',
      message: 'Benchmark returns have zero variance',
    };
  }

  return {
    status: 'available',
    value: sampleCovariance(aligned.portfolio, aligned.benchmark) / benchmarkVariance,
  };
}

/**
 * Pearson correlation over common dates
 */
export function calculateCorrelation(portfolio: ReturnSeries, benchmark: ReturnSeries): MetricValue {
  const aligned = alignReturnPairs(portfolio, benchmark);
  if (aligned.dates.length < 2) {
    return insufficientOverlap(aligned.dates.length);
  }

  const portfolioStd = sampleStandardDeviation(aligned.portfolio);
  const benchmarkStd = sampleStandardDeviation(aligned.benchmark);
  if (portfolioStd === 0 || benchmarkStd === 0) {
    return {
      status: 'unavailable',
      reason: 'ZERO_VARIANCE',
      message: portfolioStd === 0 ? 'Portfolio returns have zero variance' : 'Benchmark returns have zero variance',
    };
  }

  const correlation = sampleCovariance(aligned.portfolio, aligned.benchmark) / (portfolioStd * benchmarkStd);
  return { status: 'available', value: Math.max(-1, Math.min(1, correlation)) };
}

// ============================================================================
// MAIN PERFORMANCE FUNCTION
// ============================================================================

export interface PerformanceOptions {
  initialCapital: number;
  benchmark?: ReturnSeries | null;
  riskFreeRate?: number;
  tradingDaysPerYear?: number;
}

/**
 * Calculate the complete performance result for a return series
 *
 * @throws InsufficientDataError for an empty return series
 * @throws RangeError for a non-positive initial capital
 */
export function calculatePerformance(
  returns: ReturnSeries,
  {
    initialCapital,
    benchmark = null,
    riskFreeRate = 0,
    tradingDaysPerYear = TRADING_DAYS_PER_YEAR,
  }: PerformanceOptions
): PerformanceResult {
  if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
    throw new RangeError(`Initial capital must be positive, got ${initialCapital}`);
  }
  if (returns.length === 0) {
    throw new InsufficientDataError('Cannot compute performance of an empty return series');
  }

  const cumulative = calculateCumulativeSeries(returns);
  const totalReturnPct = calculateTotalReturnPct(cumulative);
  const annualizedReturnPct = calculateAnnualizedReturnPct(totalReturnPct, returns.length, tradingDaysPerYear);
  const volatilityPct = calculateAnnualizedVolatilityPct(returns.map((r) => r.value), tradingDaysPerYear);
  const sharpeRatio = calculateSharpeRatio(annualizedReturnPct, volatilityPct, riskFreeRate);
  const { maxDrawdownPct, drawdownPeriod } = calculateMaxDrawdown(cumulative);

  const benchmarkSeries = benchmark ?? [];
  const beta = calculateBeta(returns, benchmarkSeries);
  const correlation = calculateCorrelation(returns, benchmarkSeries);

  const finalValue = initialCapital * cumulative[cumulative.length - 1].value;

  return {
    totalReturnPct,
    annualizedReturnPct,
    volatilityPct,
    sharpeRatio,
    maxDrawdownPct,
    drawdownPeriod,
    beta,
    correlation,
    cumulativeSeries: cumulative.map((point) => ({ date: point.date, value: initialCapital * point.value })),
    initialCapital,
    finalValue,
    absoluteGain: finalValue - initialCapital,
    observations: returns.length,
  };
}
