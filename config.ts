// Application configuration
// Values come from VITE_* variables (import.meta.env in the app), with defaults below.

import { isLogLevel, createLogger, type LogLevel } from './utils/logger';

const log = createLogger('config');

export interface AppConfig {
  quoteCacheTtlMs: number;
  historyCacheTtlMs: number;
  maxCacheEntries: number;
  providerTimeoutMs: number;
  riskFreeRate: number;        // Annualized, fractional (0.02 = 2%)
  tradingDaysPerYear: number;
  benchmarkTicker: string;
  useCorsProxy: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = Object.freeze({
  quoteCacheTtlMs: 5 * 60 * 1000,       // 5 minutes
  historyCacheTtlMs: 60 * 60 * 1000,    // 1 hour
  maxCacheEntries: 1000,
  providerTimeoutMs: 10 * 1000,
  riskFreeRate: 0,
  tradingDaysPerYear: 252,
  benchmarkTicker: '^GSPC',
  useCorsProxy: false,
  logLevel: 'info',
});

export type EnvRecord = Record<string, string | boolean | undefined>;

const readNumber = (env: EnvRecord, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    log.warn(`⚠️ Ignoring invalid ${key}="${String(raw)}", using ${fallback}`);
    return fallback;
  }
  return parsed;
};

const readBoolean = (env: EnvRecord, key: string, fallback: boolean): boolean => {
  const raw = env[key];
  if (typeof raw === 'boolean') return raw;
  if (raw === undefined || raw === '') return fallback;
  return raw.toLowerCase() === 'true';
};

/**
 * Build the runtime configuration from an environment record
 */
export const resolveConfig = (env: EnvRecord = {}): Readonly<AppConfig> => {
  const rawLevel = env.VITE_LOG_LEVEL;
  let logLevel = DEFAULT_CONFIG.logLevel;
  if (typeof rawLevel === 'string' && rawLevel !== '') {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      log.warn(`⚠️ Unknown VITE_LOG_LEVEL="${rawLevel}", using ${logLevel}`);
    }
  }

  const benchmark = env.VITE_BENCHMARK_TICKER;

  return Object.freeze({
    quoteCacheTtlMs: readNumber(env, 'VITE_QUOTE_CACHE_TTL_MS', DEFAULT_CONFIG.quoteCacheTtlMs),
    historyCacheTtlMs: readNumber(env, 'VITE_HISTORY_CACHE_TTL_MS', DEFAULT_CONFIG.historyCacheTtlMs),
    maxCacheEntries: Math.max(1, Math.floor(readNumber(env, 'VITE_MAX_CACHE_ENTRIES', DEFAULT_CONFIG.maxCacheEntries))),
    providerTimeoutMs: readNumber(env, 'VITE_PROVIDER_TIMEOUT_MS', DEFAULT_CONFIG.providerTimeoutMs),
    riskFreeRate: readNumber(env, 'VITE_RISK_FREE_RATE', DEFAULT_CONFIG.riskFreeRate),
    tradingDaysPerYear: readNumber(env, 'VITE_TRADING_DAYS_PER_YEAR', DEFAULT_CONFIG.tradingDaysPerYear) || DEFAULT_CONFIG.tradingDaysPerYear,
    benchmarkTicker: typeof benchmark === 'string' && benchmark.trim() !== ''
      ? benchmark.trim().toUpperCase()
      : DEFAULT_CONFIG.benchmarkTicker,
    useCorsProxy: readBoolean(env, 'VITE_USE_CORS_PROXY', DEFAULT_CONFIG.useCorsProxy),
    logLevel,
  });
};
