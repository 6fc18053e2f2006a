/**
 * Display formatting shared by the dashboard and the CSV export
 */

import type { AnalysisPeriod, FixedAnalysisPeriod, MetricValue, TickerFailure } from '../types';

export const NOT_AVAILABLE = 'N/A';

const signed = (value: number, digits: number): string => {
  const text = Math.abs(value).toFixed(digits);
  const isZero = Number(text) === 0;
  return `${value < 0 && !isZero ? '-' : '+'}${text}`;
};

/**
 * Percentage with an explicit sign: 16.2834 → "+16.28%", -3.1 → "-3.10%", 0 → "+0.00%"
 */
export const formatSignedPercent = (value: number, digits: number = 2): string =>
  `${signed(value, digits)}%`;

/**
 * Ratio with an explicit sign: 1.4567 → "+1.46"
 */
export const formatSignedRatio = (value: number, digits: number = 2): string => signed(value, digits);

/**
 * Plain money amount, 2 decimals, no grouping
 */
export const formatMoney = (value: number): string => value.toFixed(2);

/**
 * Money for on-screen display: $10,000.00
 */
export const formatCurrency = (value: number): string =>
  `${value < 0 ? '-' : ''}$${Math.abs(value).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;

export const formatMetricValue = (metric: MetricValue): string =>
  metric.status === 'available' ? formatSignedRatio(metric.value) : NOT_AVAILABLE;

const FIXED_PERIOD_LABELS: Record<FixedAnalysisPeriod, string> = {
  '6mo': '6 Months',
  '1y': '1 Year',
  '2y': '2 Years',
  '5y': '5 Years',
};

export const formatPeriodLabel = (period: AnalysisPeriod): string =>
  typeof period === 'string'
    ? FIXED_PERIOD_LABELS[period]
    : `${period.days} ${period.days === 1 ? 'Day' : 'Days'}`;

/**
 * Compact market cap: 2.5e12 → "$2.50T"
 */
export const formatMarketCap = (value: number | null): string => {
  if (value === null) return NOT_AVAILABLE;
  if (value >= 1e12) return `$${(value / 1e12).toFixed(2)}T`;
  if (value >= 1e9) return `$${(value / 1e9).toFixed(2)}B`;
  if (value >= 1e6) return `$${(value / 1e6).toFixed(2)}M`;
  return `$${value.toFixed(0)}`;
};

/**
 * Excluded holding with the reason it was left out, e.g. "SLOW (request timed out after 20ms)"
 */
export const formatExclusion = (failure: TickerFailure): string => {
  const prefix = `${failure.ticker}: `;
  const reason = failure.message.startsWith(prefix) ? failure.message.slice(prefix.length) : failure.message;
  return `${failure.ticker} (${reason})`;
};
