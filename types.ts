/**
 * ISO calendar date (YYYY-MM-DD). String order is calendar order.
 */
export type IsoDate = string;

// ============================================================================
// PRICE & RETURN SERIES
// ============================================================================

export interface PricePoint {
  date: IsoDate;
  close: number;
}

/**
 * Ascending by date, no duplicate dates. Non-trading days are absent, not null-filled.
 */
export type PriceSeries = PricePoint[];

export interface ReturnPoint {
  date: IsoDate;
  value: number; // Fractional return (0.05 = +5%)
}

/**
 * Day-over-day returns, one entry shorter than the source price series.
 */
export type ReturnSeries = ReturnPoint[];

export interface OhlcBar {
  date: IsoDate;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type FixedAnalysisPeriod = '6mo' | '1y' | '2y' | '5y';

/**
 * Lookback window for history requests
 */
export type AnalysisPeriod = FixedAnalysisPeriod | { days: number };

export const FIXED_ANALYSIS_PERIODS: readonly FixedAnalysisPeriod[] = ['6mo', '1y', '2y', '5y'];

// ============================================================================
// QUOTES
// ============================================================================

/**
 * Current price snapshot. Fields the upstream did not report are null, never 0.
 */
export interface QuoteSnapshot {
  ticker: string;
  companyName: string;
  price: number;
  change: number;
  changePercent: number;
  volume: number | null;
  marketCap: number | null;
  peRatio: number | null;
  dividendYield: number | null;
  sector: string | null;
  fiftyTwoWeekHigh: number | null;
  fiftyTwoWeekLow: number | null;
  avgVolume: number | null;
  lastUpdated: string; // ISO timestamp
}

// ============================================================================
// SCENARIOS
// ============================================================================

export interface Holding {
  ticker: string;
  weight: number;            // Raw allocation as entered (e.g. 25 for 25%); normalized by the engine
  shares?: number;
  purchasePrice?: number;
  addedAt: string;
}

export interface PortfolioScenario {
  id: string;
  name: string;
  initialCapital: number;
  holdings: readonly Holding[];
  analysisPeriod: AnalysisPeriod;
  createdAt: string;
  updatedAt: string;
}

/**
 * The read view the analysis engine needs from a scenario
 */
export interface ScenarioAllocation {
  weights: Record<string, number>;
  initialCapital: number;
  period: AnalysisPeriod;
}

// ============================================================================
// PER-TICKER RESULTS
// ============================================================================

export type TickerFailureKind = 'PROVIDER_UNAVAILABLE' | 'NO_DATA_FOR_PERIOD';

export interface TickerFailure {
  ticker: string;
  kind: TickerFailureKind;
  message: string;
}

export type TickerResult<T> =
  | { ok: true; ticker: string; value: T }
  | { ok: false; failure: TickerFailure };

export interface BatchResult<T> {
  succeeded: Map<string, T>;
  failed: TickerFailure[];
}

// ============================================================================
// PERFORMANCE METRICS
// ============================================================================

export type UnavailableReason = 'INSUFFICIENT_OVERLAP' | 'ZERO_VARIANCE';

/**
 * A metric that may legitimately be impossible to compute (beta, correlation)
 */
export type MetricValue =
  | { status: 'available'; value: number }
  | { status: 'unavailable'; reason: UnavailableReason; message: string };

export interface ValuePoint {
  date: IsoDate;
  value: number;
}

export interface DrawdownPeriod {
  peakDate: IsoDate;
  troughDate: IsoDate;
}

export interface PerformanceResult {
  totalReturnPct: number;
  annualizedReturnPct: number;
  volatilityPct: number;
  sharpeRatio: number;
  maxDrawdownPct: number;               // Always <= 0
  drawdownPeriod: DrawdownPeriod | null;
  beta: MetricValue;
  correlation: MetricValue;
  cumulativeSeries: ValuePoint[];       // Capital-scaled value per date
  initialCapital: number;
  finalValue: number;
  absoluteGain: number;
  observations: number;
}

export interface WeightedReturnResult {
  returns: ReturnSeries;
  weights: Record<string, number>;      // Normalized over the tickers actually used
  excluded: string[];                   // Tickers dropped for lack of usable data
}

// ============================================================================
// PORTFOLIO ANALYSIS
// ============================================================================

export interface HoldingBreakdown {
  ticker: string;
  allocationPct: number;
  initialValue: number;
  totalReturnPct: number;
  finalValue: number;
  contribution: number;
}

export interface BenchmarkComparison {
  outperformancePct: number;
  riskAdjustedOutperformance: number;
}

export interface BenchmarkPerformance {
  ticker: string;
  name: string;
  performance: PerformanceResult;
}

export interface PortfolioAnalysis {
  scenarioId: string;
  scenarioName: string;
  period: AnalysisPeriod;
  performance: PerformanceResult;
  benchmark: BenchmarkPerformance | null;
  comparison: BenchmarkComparison | null;
  holdings: HoldingBreakdown[];
  excluded: TickerFailure[];
  degraded: boolean;
  computedAt: string;
}

// ============================================================================
// INDICATORS
// ============================================================================

/**
 * Index-aligned with the source price series; null where the window has not filled yet
 */
export type IndicatorSeries = Array<number | null>;

export interface IndicatorBundle {
  sma20: IndicatorSeries;
  sma50: IndicatorSeries;
  rsi14: IndicatorSeries;
  volatility20: IndicatorSeries;
}

// ============================================================================
// MARKET SCREENING & OVERVIEW
// ============================================================================

export interface ScreeningFilters {
  minPe?: number;
  maxPe?: number;
  minDividendYield?: number;
  sector?: string;
  minMarketCap?: number;
  maxMarketCap?: number;
}

export interface SectorPerformance {
  sector: string;
  averageChangePercent: number;
  sampleSize: number;
}

export type MarketSentiment = 'STRONG_BULLISH' | 'BULLISH' | 'MIXED' | 'BEARISH' | 'STRONG_BEARISH';

export interface MarketBreadth {
  advancing: number;
  declining: number;
  unchanged: number;
  sentiment: MarketSentiment;
}

export interface IndexSnapshot {
  ticker: string;
  name: string;
  price: number;
  change: number;
  changePercent: number;
}

export interface MarketUniverse {
  screening: string[];
  sectors: Record<string, string[]>;
  movers: string[];
  indices: Array<{ ticker: string; name: string }>;
}
