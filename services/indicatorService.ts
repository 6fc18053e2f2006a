/**
 * Technical indicators over a price series.
 *
 * Every output is index-aligned with the input series. Points where the window
 * has not filled yet are null: "not yet available", never zero.
 */

import type { IndicatorBundle, IndicatorSeries, PriceSeries } from '../types';
import { sampleStandardDeviation } from './performanceMetricsService';

const assertWindow = (name: string, value: number, minimum: number): void => {
  if (!Number.isInteger(value) || value < minimum) {
    throw new RangeError(`${name} must be an integer >= ${minimum}, got ${value}`);
  }
};

/**
 * Simple moving average of closes. First `window - 1` entries are null.
 */
export function calculateSMA(series: PriceSeries, window: number): IndicatorSeries {
  assertWindow('window', window, 1);

  const result: IndicatorSeries = [];
  let windowSum = 0;

  for (let i = 0; i < series.length; i++) {
    windowSum += series[i].close;
    if (i >= window) {
      windowSum -= series[i - window].close;
    }
    result.push(i >= window - 1 ? windowSum / window : null);
  }

  return result;
}

const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
};

/**
 * Relative Strength Index with Wilder smoothing.
 *
 * The first average gain/loss is the simple mean of the first `period` price changes,
 * later ones are smoothed as (prev * (period - 1) + current) / period.
 * First `period` entries are null.
 */
export function calculateRSI(series: PriceSeries, period: number = 14): IndicatorSeries {
  assertWindow('period', period, 1);

  const result: IndicatorSeries = series.map(() => null);
  if (series.length <= period) return result;

  let avgGain = 0;
  let avgLoss = 0;

  for (let i = 1; i <= period; i++) {
    const change = series[i].close - series[i - 1].close;
    if (change > 0) avgGain += change;
    else avgLoss -= change;
  }
  avgGain /= period;
  avgLoss /= period;
  result[period] = rsiFromAverages(avgGain, avgLoss);

  for (let i = period + 1; i < series.length; i++) {
    const change = series[i].close - series[i - 1].close;
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? -change : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
    result[i] = rsiFromAverages(avgGain, avgLoss);
  }

  return result;
}

/**
 * Rolling sample standard deviation of daily returns (not annualized).
 * Index 0 has no return, so the first `window` entries are null.
 */
export function calculateRollingVolatility(series: PriceSeries, window: number = 20): IndicatorSeries {
  assertWindow('window', window, 2);

  const dailyReturns: number[] = [];
  const result: IndicatorSeries = [];

  for (let i = 0; i < series.length; i++) {
    if (i === 0) {
      result.push(null);
      continue;
    }
    const prev = series[i - 1].close;
    dailyReturns.push((series[i].close - prev) / prev);

    result.push(dailyReturns.length >= window ? sampleStandardDeviation(dailyReturns.slice(-window)) : null);
  }

  return result;
}

/**
 * The indicator set shown on the stock detail chart
 */
export function calculateIndicators(series: PriceSeries): IndicatorBundle {
  return {
    sma20: calculateSMA(series, 20),
    sma50: calculateSMA(series, 50),
    rsi14: calculateRSI(series, 14),
    volatility20: calculateRollingVolatility(series, 20),
  };
}
