import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  CachedMarketDataProvider,
  YahooFinanceProvider,
  barsToPriceSeries,
  chartToBars,
  fetchQuotes,
  getMarketOverview,
  parseChartPayload,
  withTimeout,
  type ProxyBuilder,
} from './marketDataService';
import { NoDataForPeriodError, ProviderTimeoutError, ProviderUnavailableError } from '../errors';
import { screenStocks } from './screeningService';
import { FakeMarketDataProvider, bars, quote, type FakeResponse } from '../test/fakeMarketData';
import type { OhlcBar, QuoteSnapshot } from '../types';

// 09:30 New York on 2, 3 and 4 January 2024
const TIMESTAMPS = [1704205800, 1704292200, 1704378600];

const chartPayload = (closes: Array<number | null>, meta: Record<string, unknown> = {}) => ({
  chart: {
    result: [
      {
        meta: { gmtoffset: -18000, ...meta },
        timestamp: TIMESTAMPS.slice(0, closes.length),
        indicators: {
          quote: [
            {
              open: closes.map((c) => (c === null ? null : c - 1)),
              high: closes.map((c) => (c === null ? null : c + 1)),
              low: closes.map((c) => (c === null ? null : c - 2)),
              close: closes,
              volume: closes.map((c) => (c === null ? null : 5000)),
            },
          ],
        },
      },
    ],
    error: null,
  },
});

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

/**
 * fetch stand-in that answers from a queue and records the requested URLs
 */
const scriptedFetch = (responses: Array<Response | Error>) => {
  const urls: string[] = [];
  const fetchImpl = async (input: unknown): Promise<Response> => {
    urls.push(String(input));
    const next = responses.shift();
    if (next === undefined) throw new Error('unexpected request');
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetchImpl, urls };
};

const NOW = Date.UTC(2024, 0, 31);

afterEach(() => {
  vi.useRealTimers();
});

describe('parseChartPayload', () => {
  it('returns null for anything without a chart result', () => {
    expect(parseChartPayload('Too Many Requests')).toBeNull();
    expect(parseChartPayload({})).toBeNull();
    expect(parseChartPayload({ chart: { result: [] } })).toBeNull();
  });

  it('turns rows into bars dated in exchange time and drops empty closes', () => {
    const chart = parseChartPayload(chartPayload([100, null, 105]));
    expect(chart).not.toBeNull();
    if (!chart) return;

    expect(chartToBars(chart)).toEqual([
      { date: '2024-01-02', open: 99, high: 101, low: 98, close: 100, volume: 5000 },
      { date: '2024-01-04', open: 104, high: 106, low: 103, close: 105, volume: 5000 },
    ]);
  });

  it('falls back to the close when OHLC fields are missing', () => {
    const chart = parseChartPayload({
      chart: { result: [{ meta: {}, timestamp: [1704205800], indicators: { quote: [{ close: [42] }] } }] },
    });
    expect(chart).not.toBeNull();
    if (!chart) return;

    expect(chartToBars(chart)).toEqual([
      { date: '2024-01-02', open: 42, high: 42, low: 42, close: 42, volume: 0 },
    ]);
  });
});

describe('YahooFinanceProvider', () => {
  it('requests a named range and returns bars', async () => {
    const { fetchImpl, urls } = scriptedFetch([json(chartPayload([100, 102, 105]))]);
    const provider = new YahooFinanceProvider({ fetchImpl, now: () => NOW });

    const result = await provider.fetchHistory('aapl', '1y');

    expect(urls).toEqual(['https://query2.finance.yahoo.com/v8/finance/chart/AAPL?interval=1d&range=1y']);
    expect(barsToPriceSeries(result)).toEqual([
      { date: '2024-01-02', close: 100 },
      { date: '2024-01-03', close: 102 },
      { date: '2024-01-04', close: 105 },
    ]);
  });

  it('requests a day window as explicit epoch seconds', () => {
    const provider = new YahooFinanceProvider({ now: () => NOW });

    expect(provider.buildChartUrl('^GSPC', { days: 30 })).toBe(
      'https://query2.finance.yahoo.com/v8/finance/chart/%5EGSPC?interval=1d&period1=1704067200&period2=1706659200'
    );
  });

  it('reports an empty window as missing data', async () => {
    const { fetchImpl } = scriptedFetch([json(chartPayload([]))]);
    const provider = new YahooFinanceProvider({ fetchImpl });

    await expect(provider.fetchHistory('AAPL', '5y')).rejects.toThrow(NoDataForPeriodError);
  });

  it('fails with the last route error when every route fails', async () => {
    const { fetchImpl } = scriptedFetch([new Response('nope', { status: 500 })]);
    const provider = new YahooFinanceProvider({ fetchImpl });

    const error = await provider.fetchHistory('AAPL', '1y').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(error).toHaveProperty('message', 'AAPL: HTTP 500');
  });

  it('rejects a malformed payload', async () => {
    const { fetchImpl } = scriptedFetch([json({ finance: { error: 'bad' } })]);
    const provider = new YahooFinanceProvider({ fetchImpl });

    await expect(provider.fetchHistory('AAPL', '1y')).rejects.toThrow('AAPL: malformed chart payload');
  });

  it('moves on to the next proxy and unwraps its contents', async () => {
    const proxies: ProxyBuilder[] = [
      (url) => ({ url: `https://proxy-a.test/?${url}`, wrapped: false }),
      (url) => ({ url: `https://proxy-b.test/?${url}`, wrapped: true }),
    ];
    const { fetchImpl, urls } = scriptedFetch([
      new Response('busy', { status: 503 }),
      json({ contents: JSON.stringify(chartPayload([100, 101])) }),
    ]);
    const provider = new YahooFinanceProvider({ useCorsProxy: true, proxies, fetchImpl });

    const result = await provider.fetchHistory('MSFT', '6mo');

    expect(urls).toHaveLength(2);
    expect(urls[1]).toBe('https://proxy-b.test/?https://query2.finance.yahoo.com/v8/finance/chart/MSFT?interval=1d&range=6mo');
    expect(result.map((bar) => bar.close)).toEqual([100, 101]);
  });

  it('rethrows the fetch error once the request is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const { fetchImpl } = scriptedFetch([new Error('The operation was aborted')]);
    const provider = new YahooFinanceProvider({ fetchImpl });

    const error = await provider.fetchHistory('AAPL', '1y', controller.signal).catch((e: unknown) => e);

    expect(error).not.toBeInstanceOf(ProviderUnavailableError);
    expect(error).toHaveProperty('message', 'The operation was aborted');
  });

  it('builds a quote from the last two sessions', async () => {
    const { fetchImpl, urls } = scriptedFetch([
      json(chartPayload([100, 105], { regularMarketPrice: 105.5, longName: 'Example Corp', fiftyTwoWeekHigh: 120 })),
    ]);
    const provider = new YahooFinanceProvider({ fetchImpl, now: () => NOW });

    const snapshot = await provider.fetchQuote('exmp');

    expect(urls).toEqual(['https://query2.finance.yahoo.com/v8/finance/chart/EXMP?interval=1d&range=5d']);
    expect(snapshot.ticker).toBe('EXMP');
    expect(snapshot.companyName).toBe('Example Corp');
    expect(snapshot.price).toBe(105.5);
    expect(snapshot.change).toBeCloseTo(5.5, 10);
    expect(snapshot.changePercent).toBeCloseTo(5.5, 10);
    expect(snapshot.fiftyTwoWeekHigh).toBe(120);
    expect(snapshot.fiftyTwoWeekLow).toBeNull();
    expect(snapshot.peRatio).toBeNull();
    expect(snapshot.marketCap).toBeNull();
    expect(snapshot.sector).toBeNull();
    expect(snapshot.avgVolume).toBe(5000);
    expect(snapshot.lastUpdated).toBe('2024-01-31T00:00:00.000Z');
  });

  it('takes the sector from the universe so the screener can match it', async () => {
    const { fetchImpl } = scriptedFetch([json(chartPayload([190, 192], { regularMarketPrice: 192 }))]);
    const provider = new YahooFinanceProvider({ fetchImpl });

    const snapshot = await provider.fetchQuote('aapl');

    expect(snapshot.sector).toBe('Technology');
    expect(screenStocks([snapshot], { sector: 'Technology' })).toEqual([snapshot]);
    expect(screenStocks([snapshot], { sector: 'Healthcare' })).toEqual([]);
  });

  it('uses the previous close from meta when only one session came back', async () => {
    const { fetchImpl } = scriptedFetch([json(chartPayload([110], { previousClose: 100, shortName: 'EX' }))]);
    const provider = new YahooFinanceProvider({ fetchImpl });

    const snapshot = await provider.fetchQuote('EX');

    expect(snapshot.price).toBe(110);
    expect(snapshot.change).toBe(10);
    expect(snapshot.changePercent).toBeCloseTo(10, 10);
    expect(snapshot.companyName).toBe('EX');
  });
});

describe('withTimeout', () => {
  it('resolves with the task result when it finishes in time', async () => {
    await expect(withTimeout('AAPL', 1_000, async () => 'done')).resolves.toBe('done');
  });

  it('aborts the task and rejects once the timeout expires', async () => {
    vi.useFakeTimers();
    let captured: AbortSignal | undefined;

    const pending = withTimeout('AAPL', 1_000, (signal) => {
      captured = signal;
      return new Promise<never>(() => undefined);
    });
    const assertion = expect(pending).rejects.toThrow('AAPL: request timed out after 1000ms');

    await vi.advanceTimersByTimeAsync(1_000);
    await assertion;
    await expect(pending).rejects.toBeInstanceOf(ProviderTimeoutError);
    expect(captured?.aborted).toBe(true);
  });

  it('reports a timeout even when the task rejects as soon as it is aborted', async () => {
    vi.useFakeTimers();

    const pending = withTimeout('SLOW', 50, (signal) =>
      new Promise<never>((_, reject) => {
        signal.addEventListener('abort', () => reject(new DOMException('This operation was aborted', 'AbortError')));
      })
    );
    const assertion = expect(pending).rejects.toBeInstanceOf(ProviderTimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    await expect(pending).rejects.toThrow('SLOW: request timed out after 50ms');
  });

  it('passes through a task failure that happens before the timeout', async () => {
    await expect(
      withTimeout('DOWN', 1_000, async () => {
        throw new ProviderUnavailableError('DOWN', 'HTTP 502');
      })
    ).rejects.toThrow('DOWN: HTTP 502');
  });
});

describe('CachedMarketDataProvider', () => {
  const START = Date.UTC(2024, 0, 2, 15);

  const setup = (
    histories: Record<string, FakeResponse<OhlcBar[]>> = {},
    quotes: Record<string, FakeResponse<QuoteSnapshot>> = {}
  ) => {
    let now = START;
    const upstream = new FakeMarketDataProvider(
      { AAPL: bars(['2024-01-02', '2024-01-03'], [100, 101]), ...histories },
      { AAPL: quote('AAPL'), ...quotes }
    );
    const cached = new CachedMarketDataProvider(upstream, {
      quoteTtlMs: 60_000,
      historyTtlMs: 3_600_000,
      maxEntries: 50,
      now: () => now,
    });
    return { upstream, cached, advance: (ms: number) => { now += ms; } };
  };

  it('keys histories by ticker, period and day', () => {
    const { cached } = setup();
    expect(cached.historyCacheKey(' aapl ', '1y')).toBe('AAPL|1y|2024-01-02');
    expect(cached.historyCacheKey('AAPL', { days: 90 })).toBe('AAPL|90d|2024-01-02');
  });

  it('serves a repeated history lookup from cache', async () => {
    const { upstream, cached } = setup();

    await cached.fetchHistory('aapl', '1y');
    await cached.fetchHistory('AAPL', '1y');

    expect(upstream.historyCalls).toEqual([{ ticker: 'AAPL', period: '1y' }]);
  });

  it('never shares a series across periods', async () => {
    const { upstream, cached } = setup();

    await cached.fetchHistory('AAPL', '1y');
    await cached.fetchHistory('AAPL', '6mo');

    expect(upstream.historyCalls.map((call) => call.period)).toEqual(['1y', '6mo']);
  });

  it('refetches once the history TTL has passed', async () => {
    const { upstream, cached, advance } = setup();

    await cached.fetchHistory('AAPL', '1y');
    advance(3_600_000);
    await cached.fetchHistory('AAPL', '1y');

    expect(upstream.historyCalls).toHaveLength(2);
  });

  it('does not cache failures', async () => {
    const { upstream, cached } = setup({ DOWN: new ProviderUnavailableError('DOWN', 'HTTP 502') });

    await expect(cached.fetchHistory('DOWN', '1y')).rejects.toThrow('DOWN: HTTP 502');
    await expect(cached.fetchHistory('DOWN', '1y')).rejects.toThrow('DOWN: HTTP 502');

    expect(upstream.historyCalls).toHaveLength(2);
  });

  it('shares one upstream request between identical concurrent lookups', async () => {
    const { upstream, cached } = setup();

    const [first, second] = await Promise.all([
      cached.fetchHistory('AAPL', '1y'),
      cached.fetchHistory('aapl', '1y'),
    ]);

    expect(upstream.historyCalls).toHaveLength(1);
    expect(second).toBe(first);
  });

  it('keeps a shared request alive when the first caller times out', async () => {
    const signals: Array<AbortSignal | undefined> = [];
    let release: (value: OhlcBar[]) => void = () => undefined;
    const upstream = {
      fetchQuote: (): Promise<QuoteSnapshot> => Promise.reject(new Error('not used')),
      fetchHistory: (_ticker: string, _period: unknown, signal?: AbortSignal): Promise<OhlcBar[]> => {
        signals.push(signal);
        return new Promise<OhlcBar[]>((resolve) => {
          release = resolve;
        });
      },
    };
    const cached = new CachedMarketDataProvider(upstream, { quoteTtlMs: 60_000, historyTtlMs: 60_000, maxEntries: 10 });
    const series = bars(['2024-01-02', '2024-01-03'], [100, 101]);

    const first = withTimeout('AAPL', 10, (signal) => cached.fetchHistory('AAPL', '1y', signal));
    const second = cached.fetchHistory('AAPL', '1y');

    await expect(first).rejects.toThrow('AAPL: request timed out after 10ms');
    release(series);

    await expect(second).resolves.toBe(series);
    expect(signals).toEqual([undefined]);
  });

  it('lets an aborted caller stop waiting on a shared quote', async () => {
    const { cached } = setup({}, { SLOW: 'hang' });
    const controller = new AbortController();

    const pending = cached.fetchQuote('SLOW', controller.signal);
    controller.abort(new Error('caller gave up'));

    await expect(pending).rejects.toThrow('caller gave up');
  });

  it('keys quotes by ticker alone', async () => {
    const { upstream, cached, advance } = setup();

    await cached.fetchQuote('aapl');
    await cached.fetchQuote(' AAPL ');
    expect(upstream.quoteCalls).toEqual(['AAPL']);

    advance(60_000);
    await cached.fetchQuote('AAPL');
    expect(upstream.quoteCalls).toEqual(['AAPL', 'AAPL']);
  });

  it('forgets everything on clear', async () => {
    const { upstream, cached } = setup();

    await cached.fetchHistory('AAPL', '1y');
    cached.clear();
    await cached.fetchHistory('AAPL', '1y');

    expect(upstream.historyCalls).toHaveLength(2);
  });
});

describe('fetchQuotes', () => {
  it('deduplicates tickers and reports failures next to successes', async () => {
    const provider = new FakeMarketDataProvider({}, { AAPL: quote('AAPL'), MSFT: quote('MSFT') });

    const batch = await fetchQuotes(provider, ['aapl', 'MSFT', 'AAPL', 'zzz'], 1_000);

    expect(provider.quoteCalls).toEqual(['AAPL', 'MSFT', 'ZZZ']);
    expect(Array.from(batch.succeeded.keys())).toEqual(['AAPL', 'MSFT']);
    expect(batch.failed).toEqual([
      { ticker: 'ZZZ', kind: 'PROVIDER_UNAVAILABLE', message: 'ZZZ: unknown ticker' },
    ]);
  });

  it('turns a slow quote into a timeout failure', async () => {
    const provider = new FakeMarketDataProvider({}, { SLOW: 'hang' });

    const batch = await fetchQuotes(provider, ['SLOW'], 10);

    expect(batch.succeeded.size).toBe(0);
    expect(batch.failed).toEqual([
      { ticker: 'SLOW', kind: 'PROVIDER_UNAVAILABLE', message: 'SLOW: request timed out after 10ms' },
    ]);
  });
});

describe('getMarketOverview', () => {
  it('reports the last session change and skips indices without two sessions', async () => {
    const provider = new FakeMarketDataProvider({
      '^GSPC': bars(['2024-01-02', '2024-01-03', '2024-01-04'], [3900, 4000, 4040]),
      '^DJI': new ProviderUnavailableError('^DJI', 'HTTP 500'),
      '^RUT': bars(['2024-01-04'], [2000]),
    });

    const overview = await getMarketOverview(provider, [
      { ticker: '^GSPC', name: 'S&P 500' },
      { ticker: '^DJI', name: 'Dow Jones Industrial Average' },
      { ticker: '^IXIC', name: 'NASDAQ Composite' },
      { ticker: '^RUT', name: 'Russell 2000 Index' },
    ]);

    expect(provider.historyCalls.every((call) => typeof call.period !== 'string' && call.period.days === 7)).toBe(true);
    expect(overview).toHaveLength(1);
    expect(overview[0]).toMatchObject({ ticker: '^GSPC', name: 'S&P 500', price: 4040, change: 40 });
    expect(overview[0].changePercent).toBeCloseTo(1, 10);
  });
});
