/**
 * Market Data Service
 *
 * Quote and price-history providers, the per-call timeout, and the caching layer in front
 * of them. The Yahoo Finance provider reads the public chart endpoint, optionally through
 * CORS proxies when running in the browser.
 */

import type {
  AnalysisPeriod,
  BatchResult,
  IndexSnapshot,
  IsoDate,
  OhlcBar,
  PriceSeries,
  QuoteSnapshot,
  TickerResult,
} from '../types';
import {
  NoDataForPeriodError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  toTickerFailure,
} from '../errors';
import { sectorOf } from './screeningService';
import { TtlCache } from '../utils/ttlCache';
import { createLogger } from '../utils/logger';

const log = createLogger('market-data');

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// PROVIDER INTERFACES
// ============================================================================

export interface QuoteProvider {
  fetchQuote(ticker: string, signal?: AbortSignal): Promise<QuoteSnapshot>;
}

export interface HistoryProvider {
  fetchHistory(ticker: string, period: AnalysisPeriod, signal?: AbortSignal): Promise<OhlcBar[]>;
}

export type MarketDataProvider = QuoteProvider & HistoryProvider;

export const normalizeTicker = (ticker: string): string => ticker.trim().toUpperCase();

export const periodKey = (period: AnalysisPeriod): string =>
  typeof period === 'string' ? period : `${period.days}d`;

export const toIsoDate = (timestampMs: number): IsoDate => new Date(timestampMs).toISOString().slice(0, 10);

/**
 * Close-only price series from provider bars
 */
export const barsToPriceSeries = (bars: OhlcBar[]): PriceSeries =>
  bars.map((bar) => ({ date: bar.date, close: bar.close }));

// ============================================================================
// TIMEOUT
// ============================================================================

/**
 * Run a provider call under a bounded timeout. On expiry the call is aborted through
 * its signal and the promise rejects with ProviderTimeoutError.
 */
export async function withTimeout<T>(
  ticker: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timeoutError = new ProviderTimeoutError(ticker, timeoutMs);
  let timedOut = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(timeoutError);
      controller.abort(timeoutError);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } catch (error) {
    // A task that rejects on abort reports the timeout, not its own abort error
    if (timedOut) throw timeoutError;
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// YAHOO FINANCE PROVIDER
// ============================================================================

const YAHOO_CHART_URL = 'https://query2.finance.yahoo.com/v8/finance/chart';

export type ProxyBuilder = (url: string) => { url: string; wrapped: boolean };

// Same proxies as the browser build has always used; allorigins wraps the body in { contents }
export const CORS_PROXIES: ProxyBuilder[] = [
  (url) => ({ url: `https://corsproxy.io/?${encodeURIComponent(url)}`, wrapped: false }),
  (url) => ({ url: `https://api.allorigins.win/get?url=${encodeURIComponent(url)}`, wrapped: true }),
];

const DIRECT: ProxyBuilder = (url) => ({ url, wrapped: false });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const finiteOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const numberArray = (value: unknown): Array<number | null> =>
  Array.isArray(value) ? value.map(finiteOrNull) : [];

interface ChartResult {
  meta: Record<string, unknown>;
  timestamps: number[];
  quote: {
    open: Array<number | null>;
    high: Array<number | null>;
    low: Array<number | null>;
    close: Array<number | null>;
    volume: Array<number | null>;
  };
}

/**
 * Pull the first chart result out of a Yahoo payload, or null if it is malformed
 */
export const parseChartPayload = (payload: unknown): ChartResult | null => {
  if (!isRecord(payload) || !isRecord(payload.chart)) return null;
  const results = payload.chart.result;
  if (!Array.isArray(results) || !isRecord(results[0])) return null;

  const result = results[0];
  const meta = isRecord(result.meta) ? result.meta : {};
  const indicators = isRecord(result.indicators) ? result.indicators : {};
  const quotes = Array.isArray(indicators.quote) ? indicators.quote : [];
  const quote: unknown = quotes[0];
  const q = isRecord(quote) ? quote : {};

  const timestamps = numberArray(result.timestamp).filter((ts): ts is number => ts !== null);

  return {
    meta,
    timestamps,
    quote: {
      open: numberArray(q.open),
      high: numberArray(q.high),
      low: numberArray(q.low),
      close: numberArray(q.close),
      volume: numberArray(q.volume),
    },
  };
};

/**
 * Convert a chart result into daily bars dated in the exchange's timezone.
 * Rows without a positive close are dropped.
 */
export const chartToBars = (chart: ChartResult): OhlcBar[] => {
  const gmtOffsetSec = finiteOrNull(chart.meta.gmtoffset) ?? 0;
  const bars: OhlcBar[] = [];

  for (let i = 0; i < chart.timestamps.length; i++) {
    const close = chart.quote.close[i] ?? null;
    if (close === null || close <= 0) continue;

    bars.push({
      date: toIsoDate((chart.timestamps[i] + gmtOffsetSec) * 1000),
      open: chart.quote.open[i] ?? close,
      high: chart.quote.high[i] ?? close,
      low: chart.quote.low[i] ?? close,
      close,
      volume: chart.quote.volume[i] ?? 0,
    });
  }

  return bars;
};

export interface YahooFinanceProviderOptions {
  useCorsProxy?: boolean;
  proxies?: ProxyBuilder[];
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export class YahooFinanceProvider implements MarketDataProvider {
  private readonly routes: ProxyBuilder[];
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor({ useCorsProxy = false, proxies = CORS_PROXIES, fetchImpl, now = Date.now }: YahooFinanceProviderOptions = {}) {
    this.routes = useCorsProxy ? proxies : [DIRECT];
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = now;
  }

  buildChartUrl(ticker: string, period: AnalysisPeriod): string {
    const base = `${YAHOO_CHART_URL}/${encodeURIComponent(ticker)}?interval=1d`;
    if (typeof period === 'string') {
      return `${base}&range=${period}`;
    }
    const period2 = Math.floor(this.now() / 1000);
    const period1 = period2 - Math.round(period.days * DAY_MS / 1000);
    return `${base}&period1=${period1}&period2=${period2}`;
  }

  async fetchHistory(ticker: string, period: AnalysisPeriod, signal?: AbortSignal): Promise<OhlcBar[]> {
    const symbol = normalizeTicker(ticker);
    const chart = await this.fetchChart(symbol, this.buildChartUrl(symbol, period), signal);
    const bars = chartToBars(chart);

    if (bars.length === 0) {
      throw new NoDataForPeriodError(symbol, period);
    }

    log.debug(`✅ Fetched ${bars.length} bars for ${symbol} (${periodKey(period)})`);
    return bars;
  }

  async fetchQuote(ticker: string, signal?: AbortSignal): Promise<QuoteSnapshot> {
    const symbol = normalizeTicker(ticker);
    const chart = await this.fetchChart(symbol, `${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}?interval=1d&range=5d`, signal);
    const bars = chartToBars(chart);
    const meta = chart.meta;

    const lastClose = bars.length > 0 ? bars[bars.length - 1].close : null;
    const price = finiteOrNull(meta.regularMarketPrice) ?? lastClose;
    if (price === null) {
      throw new ProviderUnavailableError(symbol, 'quote has no price');
    }

    const previousClose = bars.length > 1
      ? bars[bars.length - 2].close
      : finiteOrNull(meta.previousClose) ?? finiteOrNull(meta.chartPreviousClose);
    const change = previousClose !== null ? price - previousClose : 0;
    const changePercent = previousClose !== null && previousClose > 0 ? (change / previousClose) * 100 : 0;

    const longName = meta.longName;
    const shortName = meta.shortName;
    const companyName = typeof longName === 'string' ? longName : typeof shortName === 'string' ? shortName : symbol;

    const volumes = bars.map((bar) => bar.volume).filter((volume) => volume > 0);
    const avgVolume = volumes.length > 0 ? volumes.reduce((sum, v) => sum + v, 0) / volumes.length : null;

    // The chart endpoint carries no fundamentals; those stay null rather than 0
    return {
      ticker: symbol,
      companyName,
      price,
      change,
      changePercent,
      volume: finiteOrNull(meta.regularMarketVolume),
      marketCap: null,
      peRatio: null,
      dividendYield: null,
      sector: sectorOf(symbol),
      fiftyTwoWeekHigh: finiteOrNull(meta.fiftyTwoWeekHigh),
      fiftyTwoWeekLow: finiteOrNull(meta.fiftyTwoWeekLow),
      avgVolume,
      lastUpdated: new Date(this.now()).toISOString(),
    };
  }

  private async fetchChart(ticker: string, url: string, signal?: AbortSignal): Promise<ChartResult> {
    let lastError = 'no route attempted';

    for (const route of this.routes) {
      const { url: requestUrl, wrapped } = route(url);

      try {
        const res = await this.fetchImpl(requestUrl, { signal });
        if (!res.ok) {
          lastError = `HTTP ${res.status}`;
          log.warn(`⚠️ ${ticker}: ${requestUrl} returned status ${res.status}`);
          continue;
        }

        let body: unknown = await res.json();
        if (wrapped && isRecord(body) && typeof body.contents === 'string') {
          body = JSON.parse(body.contents);
        }

        const chart = parseChartPayload(body);
        if (!chart) {
          lastError = 'malformed chart payload';
          log.warn(`⚠️ ${ticker}: invalid chart response`);
          continue;
        }
        return chart;
      } catch (error) {
        if (signal?.aborted) throw error;
        lastError = error instanceof Error ? error.message : String(error);
        log.warn(`❌ ${ticker}: request failed: ${lastError}`);
      }
    }

    throw new ProviderUnavailableError(ticker, lastError);
  }
}

// ============================================================================
// CACHING PROVIDER
// ============================================================================

export interface CachedMarketDataProviderOptions {
  quoteTtlMs: number;
  historyTtlMs: number;
  maxEntries: number;
  now?: () => number;
}

const track = async <T>(pending: Map<string, Promise<T>>, key: string, request: Promise<T>): Promise<T> => {
  pending.set(key, request);
  try {
    return await request;
  } finally {
    pending.delete(key);
  }
};

// The caller stops waiting on abort; the shared request keeps running for the others
const untilAborted = <T>(request: Promise<T>, signal?: AbortSignal): Promise<T> => {
  if (!signal) return request;
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void request.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
};

/**
 * Absorbs repeated lookups within a short window.
 *
 * Quotes are keyed by ticker alone. Histories are keyed by ticker, period and as-of day, so
 * a series is never shared across different requested periods. Failures are not cached, and
 * identical lookups already in flight share one upstream request, issued without any caller's
 * signal so one caller's abort does not fail the others.
 */
export class CachedMarketDataProvider implements MarketDataProvider {
  private readonly quotes: TtlCache<QuoteSnapshot>;
  private readonly histories: TtlCache<OhlcBar[]>;
  private readonly pendingQuotes = new Map<string, Promise<QuoteSnapshot>>();
  private readonly pendingHistories = new Map<string, Promise<OhlcBar[]>>();
  private readonly now: () => number;

  constructor(private readonly upstream: MarketDataProvider, options: CachedMarketDataProviderOptions) {
    this.now = options.now ?? Date.now;
    this.quotes = new TtlCache({ ttlMs: options.quoteTtlMs, maxEntries: options.maxEntries, now: this.now });
    this.histories = new TtlCache({ ttlMs: options.historyTtlMs, maxEntries: options.maxEntries, now: this.now });
  }

  historyCacheKey(ticker: string, period: AnalysisPeriod): string {
    return `${normalizeTicker(ticker)}|${periodKey(period)}|${toIsoDate(this.now())}`;
  }

  async fetchQuote(ticker: string, signal?: AbortSignal): Promise<QuoteSnapshot> {
    const key = normalizeTicker(ticker);
    const cached = this.quotes.get(key);
    if (cached) return cached;

    const request = this.pendingQuotes.get(key) ?? track(this.pendingQuotes, key, this.upstream.fetchQuote(key).then((quote) => {
      this.quotes.set(key, quote);
      return quote;
    }));
    return untilAborted(request, signal);
  }

  async fetchHistory(ticker: string, period: AnalysisPeriod, signal?: AbortSignal): Promise<OhlcBar[]> {
    const key = this.historyCacheKey(ticker, period);
    const cached = this.histories.get(key);
    if (cached) return cached;

    const request = this.pendingHistories.get(key) ?? track(this.pendingHistories, key, this.upstream.fetchHistory(normalizeTicker(ticker), period).then((bars) => {
      this.histories.set(key, bars);
      return bars;
    }));
    return untilAborted(request, signal);
  }

  clear(): void {
    this.quotes.clear();
    this.histories.clear();
  }
}

// ============================================================================
// BATCH HELPERS
// ============================================================================

/**
 * Fetch quotes for many tickers concurrently, each under its own timeout.
 * Results are merged after every request settles; failures are reported, not thrown.
 */
export async function fetchQuotes(
  provider: QuoteProvider,
  tickers: string[],
  timeoutMs: number
): Promise<BatchResult<QuoteSnapshot>> {
  const unique = Array.from(new Set(tickers.map(normalizeTicker)));

  const results = await Promise.all(
    unique.map(async (ticker): Promise<TickerResult<QuoteSnapshot>> => {
      try {
        const value = await withTimeout(ticker, timeoutMs, (signal) => provider.fetchQuote(ticker, signal));
        return { ok: true, ticker, value };
      } catch (error) {
        return { ok: false, failure: toTickerFailure(ticker, error) };
      }
    })
  );

  const batch: BatchResult<QuoteSnapshot> = { succeeded: new Map(), failed: [] };
  for (const result of results) {
    if (result.ok) {
      batch.succeeded.set(result.ticker, result.value);
    } else {
      log.warn(`⚠️ Quote unavailable for ${result.failure.ticker}: ${result.failure.message}`);
      batch.failed.push(result.failure);
    }
  }
  return batch;
}

/**
 * Last close and day change of the major indices, from their most recent two sessions.
 * Indices that fail or have fewer than two sessions are skipped.
 */
export async function getMarketOverview(
  provider: HistoryProvider,
  indices: ReadonlyArray<{ ticker: string; name: string }>,
  timeoutMs: number = 10_000
): Promise<IndexSnapshot[]> {
  const settled = await Promise.allSettled(
    indices.map((index) =>
      withTimeout(index.ticker, timeoutMs, (signal) => provider.fetchHistory(index.ticker, { days: 7 }, signal))
    )
  );

  const overview: IndexSnapshot[] = [];
  settled.forEach((outcome, i) => {
    const index = indices[i];
    if (outcome.status === 'rejected') {
      log.warn(`⚠️ Skipping ${index.ticker}: ${toTickerFailure(index.ticker, outcome.reason).message}`);
      return;
    }

    const bars = outcome.value;
    if (bars.length < 2) return;

    const price = bars[bars.length - 1].close;
    const previous = bars[bars.length - 2].close;
    overview.push({
      ticker: index.ticker,
      name: index.name,
      price,
      change: price - previous,
      changePercent: ((price - previous) / previous) * 100,
    });
  });

  return overview;
}
