// ============================================================================
// RETURN ALIGNMENT & WEIGHTING
// ============================================================================
// Turns per-ticker price series with different trading calendars into one
// weighted portfolio return series.
//
// Calendar policy: outer join on dates, zero fill. A ticker with no price on a
// calendar date contributes a 0 return for that date instead of the date being
// dropped. This keeps the sample size but slightly understates cross-asset
// volatility on partial-coverage days (e.g. a stock listed mid-window, or
// exchanges with different holidays).
// ============================================================================

import type { IsoDate, PriceSeries, ReturnSeries, WeightedReturnResult } from '../types';
import { InsufficientDataError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('alignment');

/**
 * Sort ascending, keep the last observation per date, drop unusable closes
 */
export function sanitizePriceSeries(series: PriceSeries): PriceSeries {
  const byDate = new Map<IsoDate, number>();
  for (const point of series) {
    if (!Number.isFinite(point.close) || point.close <= 0) continue;
    byDate.set(point.date, point.close);
  }

  return Array.from(byDate.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, close]) => ({ date, close }));
}

/**
 * Day-over-day percentage change, dated at the later observation.
 * The first date has no return, so the result is one entry shorter.
 */
export function calculateReturns(series: PriceSeries): ReturnSeries {
  const returns: ReturnSeries = [];
  for (let i = 1; i < series.length; i++) {
    const prev = series[i - 1].close;
    returns.push({
      date: series[i].date,
      value: (series[i].close - prev) / prev,
    });
  }
  return returns;
}

/**
 * Scale positive weights so they sum to 1.
 * Accepts any positive total (percentages, share counts, dollar amounts).
 */
export function normalizeWeights(weights: Record<string, number>): Record<string, number> {
  const entries = Object.entries(weights);
  if (entries.length === 0) {
    throw new InsufficientDataError('Cannot normalize an empty set of weights');
  }

  for (const [ticker, weight] of entries) {
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new RangeError(`Weight for ${ticker} must be a positive number, got ${weight}`);
    }
  }

  const total = entries.reduce((sum, [, weight]) => sum + weight, 0);
  const normalized: Record<string, number> = {};
  for (const [ticker, weight] of entries) {
    normalized[ticker] = weight / total;
  }
  return normalized;
}

/**
 * Align per-ticker price series on a common calendar and compute the weighted return series.
 *
 * - Tickers whose series is missing or has fewer than 2 usable prices are excluded and the
 *   remaining weights are renormalized to sum to 1.
 * - The calendar is the sorted union of every usable series' dates minus the first date overall.
 * - Each ticker's return on a calendar date is its own day-over-day return if it traded that day,
 *   else 0.
 *
 * @throws InsufficientDataError when no ticker has usable data
 */
export function alignWeightedReturns(
  priceSeriesByTicker: ReadonlyMap<string, PriceSeries>,
  weights: Record<string, number>
): WeightedReturnResult {
  const usable = new Map<string, PriceSeries>();
  const excluded: string[] = [];

  for (const [ticker, weight] of Object.entries(weights)) {
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new RangeError(`Weight for ${ticker} must be a positive number, got ${weight}`);
    }
    const raw = priceSeriesByTicker.get(ticker);
    const series = raw ? sanitizePriceSeries(raw) : [];
    if (series.length < 2) {
      excluded.push(ticker);
      continue;
    }
    usable.set(ticker, series);
  }

  if (excluded.length > 0) {
    log.warn(`⚠️ Excluding ${excluded.join(', ')} (no usable price history)`);
  }

  if (usable.size === 0) {
    throw new InsufficientDataError('No ticker produced usable price history');
  }

  const usableWeights: Record<string, number> = {};
  for (const ticker of usable.keys()) {
    usableWeights[ticker] = weights[ticker];
  }
  const normalized = normalizeWeights(usableWeights);

  // Union of all trading dates; the first one overall has no return
  const dateSet = new Set<IsoDate>();
  for (const series of usable.values()) {
    for (const point of series) dateSet.add(point.date);
  }
  const calendar = Array.from(dateSet).sort().slice(1);

  const returnsByTicker = new Map<string, Map<IsoDate, number>>();
  for (const [ticker, series] of usable) {
    returnsByTicker.set(
      ticker,
      new Map(calculateReturns(series).map((point) => [point.date, point.value]))
    );
  }

  const returns: ReturnSeries = calendar.map((date) => {
    let value = 0;
    for (const [ticker, tickerReturns] of returnsByTicker) {
      value += normalized[ticker] * (tickerReturns.get(date) ?? 0);
    }
    return { date, value };
  });

  log.debug(`📐 Aligned ${usable.size} series over ${returns.length} return dates`);

  return { returns, weights: normalized, excluded };
}
