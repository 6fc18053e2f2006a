/**
 * Portfolio Analysis Service
 *
 * Runs one scenario end to end: fetch every holding and the benchmark concurrently, align and
 * weight the returns, then compute portfolio and benchmark metrics, a per-holding breakdown and
 * the comparison against the benchmark.
 *
 * Every call owns its intermediate maps; nothing is shared between concurrent analyses.
 */

import type {
  AnalysisPeriod,
  BatchResult,
  BenchmarkComparison,
  BenchmarkPerformance,
  HoldingBreakdown,
  PortfolioAnalysis,
  PortfolioScenario,
  PriceSeries,
  ReturnSeries,
  TickerFailure,
  TickerResult,
} from '../types';
import type { AppConfig } from '../config';
import { BenchmarkOverlapError, InsufficientDataError, toTickerFailure } from '../errors';
import { createLogger } from '../utils/logger';
import { barsToPriceSeries, normalizeTicker, periodKey, withTimeout, type HistoryProvider } from './marketDataService';
import { alignWeightedReturns, sanitizePriceSeries } from './returnAlignmentService';
import { alignReturnPairs, calculatePerformance } from './performanceMetricsService';
import { toAllocation } from './scenarioStore';
import { MARKET_UNIVERSE } from './screeningService';

const log = createLogger('analysis');

// ============================================================================
// CONCURRENT HISTORY FETCH
// ============================================================================

export interface FetchHistoriesOptions {
  timeoutMs: number;
}

/**
 * Fetch the price history of every ticker concurrently, each under its own timeout.
 * Results are merged only after every request has settled. Failures are classified and
 * returned, never thrown.
 */
export async function fetchPriceHistories(
  provider: HistoryProvider,
  tickers: string[],
  period: AnalysisPeriod,
  { timeoutMs }: FetchHistoriesOptions
): Promise<BatchResult<PriceSeries>> {
  const unique = Array.from(new Set(tickers.map(normalizeTicker)));

  const results = await Promise.all(
    unique.map(async (ticker): Promise<TickerResult<PriceSeries>> => {
      try {
        const bars = await withTimeout(ticker, timeoutMs, (signal) => provider.fetchHistory(ticker, period, signal));
        return { ok: true, ticker, value: barsToPriceSeries(bars) };
      } catch (error) {
        return { ok: false, failure: toTickerFailure(ticker, error) };
      }
    })
  );

  const batch: BatchResult<PriceSeries> = { succeeded: new Map(), failed: [] };
  for (const result of results) {
    if (result.ok) {
      batch.succeeded.set(result.ticker, result.value);
    } else {
      log.warn(`⚠️ ${result.failure.kind} for ${result.failure.ticker} (${periodKey(period)}): ${result.failure.message}`);
      batch.failed.push(result.failure);
    }
  }

  return batch;
}

// ============================================================================
// SCENARIO ANALYSIS
// ============================================================================

export interface AnalyzeScenarioOptions {
  provider: HistoryProvider;
  config: Pick<AppConfig, 'providerTimeoutMs' | 'riskFreeRate' | 'tradingDaysPerYear' | 'benchmarkTicker'>;
  /** Overrides config.benchmarkTicker; pass null to skip the benchmark entirely */
  benchmarkTicker?: string | null;
  now?: () => number;
}

const benchmarkDisplayName = (ticker: string): string =>
  MARKET_UNIVERSE.indices.find((index) => index.ticker === ticker)?.name ?? ticker;

/**
 * Tickers with a fetched series too short to produce a return
 */
const findShortSeries = (series: ReadonlyMap<string, PriceSeries>, period: AnalysisPeriod): TickerFailure[] =>
  Array.from(series.entries())
    .filter(([, prices]) => sanitizePriceSeries(prices).length < 2)
    .map(([ticker]): TickerFailure => ({
      ticker,
      kind: 'NO_DATA_FOR_PERIOD',
      message: `${ticker}: fewer than 2 usable prices for period ${periodKey(period)}`,
    }));

/**
 * Price-only return of each holding over the window, valued at its normalized allocation
 */
export function calculateHoldingBreakdown(
  series: ReadonlyMap<string, PriceSeries>,
  weights: Record<string, number>,
  initialCapital: number
): HoldingBreakdown[] {
  const breakdown: HoldingBreakdown[] = [];

  for (const [ticker, weight] of Object.entries(weights)) {
    const prices = sanitizePriceSeries(series.get(ticker) ?? []);
    if (prices.length < 2) continue;

    const first = prices[0].close;
    const last = prices[prices.length - 1].close;
    const totalReturnPct = (last / first - 1) * 100;
    const initialValue = initialCapital * weight;

    breakdown.push({
      ticker,
      allocationPct: weight * 100,
      initialValue,
      totalReturnPct,
      finalValue: initialValue * (last / first),
      contribution: weight * totalReturnPct,
    });
  }

  return breakdown;
}

/**
 * Analyze a scenario against its benchmark
 *
 * @throws InsufficientDataError when no holding has usable history (carries every failure)
 * @throws BenchmarkOverlapError when the benchmark shares no return date with the portfolio
 */
export async function analyzeScenario(
  scenario: PortfolioScenario,
  { provider, config, benchmarkTicker, now = Date.now }: AnalyzeScenarioOptions
): Promise<PortfolioAnalysis> {
  const allocation = toAllocation(scenario);
  const tickers = Object.keys(allocation.weights);

  if (tickers.length === 0) {
    throw new InsufficientDataError(`Scenario "${scenario.name}" has no holdings`);
  }

  const benchmarkSymbol = benchmarkTicker === null ? null : normalizeTicker(benchmarkTicker ?? config.benchmarkTicker);
  const fetchOptions = { timeoutMs: config.providerTimeoutMs };

  log.info(`📈 Analyzing "${scenario.name}" (${tickers.length} holdings, ${periodKey(allocation.period)})`);

  const [holdingsBatch, benchmarkBatch] = await Promise.all([
    fetchPriceHistories(provider, tickers, allocation.period, fetchOptions),
    benchmarkSymbol
      ? fetchPriceHistories(provider, [benchmarkSymbol], allocation.period, fetchOptions)
      : Promise.resolve(null),
  ]);

  // --- Portfolio returns ---
  const excluded = [...holdingsBatch.failed, ...findShortSeries(holdingsBatch.succeeded, allocation.period)];
  if (excluded.length === tickers.length) {
    throw new InsufficientDataError(`No holding in "${scenario.name}" produced usable price history`, excluded);
  }

  const weighted = alignWeightedReturns(holdingsBatch.succeeded, allocation.weights);

  // --- Benchmark returns ---
  let benchmarkReturns: ReturnSeries | null = null;
  if (benchmarkSymbol && benchmarkBatch) {
    const series = benchmarkBatch.succeeded.get(benchmarkSymbol);
    if (series && sanitizePriceSeries(series).length >= 2) {
      benchmarkReturns = alignWeightedReturns(benchmarkBatch.succeeded, { [benchmarkSymbol]: 1 }).returns;
    } else {
      log.warn(`⚠️ Benchmark ${benchmarkSymbol} unavailable, continuing without it`);
    }
  }

  if (benchmarkSymbol && benchmarkReturns && alignReturnPairs(weighted.returns, benchmarkReturns).dates.length === 0) {
    throw new BenchmarkOverlapError(benchmarkSymbol);
  }

  // --- Metrics ---
  const metricOptions = {
    initialCapital: allocation.initialCapital,
    riskFreeRate: config.riskFreeRate,
    tradingDaysPerYear: config.tradingDaysPerYear,
  };

  const performance = calculatePerformance(weighted.returns, { ...metricOptions, benchmark: benchmarkReturns });

  let benchmark: BenchmarkPerformance | null = null;
  let comparison: BenchmarkComparison | null = null;
  if (benchmarkSymbol && benchmarkReturns) {
    benchmark = {
      ticker: benchmarkSymbol,
      name: benchmarkDisplayName(benchmarkSymbol),
      performance: calculatePerformance(benchmarkReturns, { ...metricOptions, benchmark: benchmarkReturns }),
    };
    comparison = {
      outperformancePct: performance.totalReturnPct - benchmark.performance.totalReturnPct,
      riskAdjustedOutperformance: performance.sharpeRatio - benchmark.performance.sharpeRatio,
    };
  }

  const holdings = calculateHoldingBreakdown(holdingsBatch.succeeded, weighted.weights, allocation.initialCapital);

  if (excluded.length > 0) {
    log.warn(`⚠️ "${scenario.name}" computed without ${excluded.map((f) => f.ticker).join(', ')}`);
  }
  log.info(`✅ "${scenario.name}": total return ${performance.totalReturnPct.toFixed(2)}% over ${performance.observations} days`);

  return {
    scenarioId: scenario.id,
    scenarioName: scenario.name,
    period: allocation.period,
    performance,
    benchmark,
    comparison,
    holdings,
    excluded,
    degraded: excluded.length > 0,
    computedAt: new Date(now()).toISOString(),
  };
}
