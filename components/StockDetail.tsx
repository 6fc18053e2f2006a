import React from 'react';
import { LineChart, Loader2, X } from 'lucide-react';
import type { IndicatorSeries, QuoteSnapshot, IndicatorBundle, PriceSeries } from '../types';
import { formatMarketCap, formatSignedPercent, NOT_AVAILABLE } from '../utils/formatters';

interface StockDetailProps {
  ticker: string;
  quote: QuoteSnapshot | null;
  history: PriceSeries;
  indicators: IndicatorBundle | null;
  isLoading: boolean;
  error: string | null;
  onClose: () => void;
}

const latest = (series: IndicatorSeries | undefined): number | null => {
  if (!series) return null;
  for (let i = series.length - 1; i >= 0; i--) {
    const value = series[i];
    if (value !== null) return value;
  }
  return null;
};

const rsiLabel = (rsi: number | null): string => {
  if (rsi === null) return '';
  if (rsi >= 70) return 'Overbought';
  if (rsi <= 30) return 'Oversold';
  return 'Neutral';
};

export const StockDetail: React.FC<StockDetailProps> = ({
  ticker,
  quote,
  history,
  indicators,
  isLoading,
  error,
  onClose,
}) => {
  const sma20 = latest(indicators?.sma20);
  const sma50 = latest(indicators?.sma50);
  const rsi = latest(indicators?.rsi14);
  const volatility = latest(indicators?.volatility20);
  const low = quote?.fiftyTwoWeekLow ?? null;
  const high = quote?.fiftyTwoWeekHigh ?? null;

  const stats: Array<{ label: string; value: string; hint?: string }> = [
    { label: 'SMA 20', value: sma20 !== null ? `$${sma20.toFixed(2)}` : NOT_AVAILABLE },
    { label: 'SMA 50', value: sma50 !== null ? `$${sma50.toFixed(2)}` : NOT_AVAILABLE },
    { label: 'RSI 14', value: rsi !== null ? rsi.toFixed(1) : NOT_AVAILABLE, hint: rsiLabel(rsi) },
    {
      label: 'Volatility (20d)',
      value: volatility !== null ? `${(volatility * 100).toFixed(2)}%` : NOT_AVAILABLE,
      hint: 'daily',
    },
    { label: '52W Range', value: low !== null && high !== null ? `$${low.toFixed(2)} - $${high.toFixed(2)}` : NOT_AVAILABLE },
    { label: 'Market Cap', value: formatMarketCap(quote?.marketCap ?? null) },
  ];

  return (
    <div className="bg-slate-800 border border-slate-700 rounded-xl p-6 shadow-lg mb-8">
      <div className="flex items-center justify-between mb-4">
        <div className="flex items-center gap-2">
          <LineChart className="text-indigo-500" size={20} />
          <h2 className="text-lg font-semibold text-slate-100">
            {ticker}
            {quote && <span className="text-slate-400 font-normal"> · {quote.companyName}</span>}
          </h2>
          {isLoading && <Loader2 className="animate-spin text-slate-400" size={16} />}
        </div>
        <button onClick={onClose} className="text-slate-400 hover:text-white transition-colors">
          <X size={20} />
        </button>
      </div>

      {error && <p className="text-rose-300 text-sm mb-4">{error}</p>}

      {quote && (
        <div className="flex items-baseline gap-3 mb-4">
          <span className="text-3xl font-bold text-white">${quote.price.toFixed(2)}</span>
          <span className={quote.changePercent >= 0 ? 'text-emerald-400' : 'text-rose-400'}>
            {quote.change >= 0 ? '+' : ''}{quote.change.toFixed(2)} ({formatSignedPercent(quote.changePercent)})
          </span>
        </div>
      )}

      <div className="grid grid-cols-2 md:grid-cols-3 gap-4">
        {stats.map((stat) => (
          <div key={stat.label} className="bg-slate-900/50 rounded-lg p-4">
            <span className="text-xs text-slate-400 uppercase">{stat.label}</span>
            <div className="text-lg font-bold text-white">{stat.value}</div>
            {stat.hint && <div className="text-xs text-slate-500">{stat.hint}</div>}
          </div>
        ))}
      </div>

      {history.length > 0 && (
        <div className="text-xs text-slate-500 mt-4">
          {history.length} sessions, {history[0].date} to {history[history.length - 1].date}
        </div>
      )}
    </div>
  );
};
