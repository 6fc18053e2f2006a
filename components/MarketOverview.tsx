import React from 'react';
import { Activity, Loader2, RefreshCw, TrendingDown, TrendingUp } from 'lucide-react';
import type { IndexSnapshot, MarketBreadth, MarketSentiment, QuoteSnapshot, SectorPerformance } from '../types';
import { formatSignedPercent } from '../utils/formatters';

interface MarketOverviewProps {
  indices: IndexSnapshot[];
  sectors: SectorPerformance[];
  breadth: MarketBreadth;
  topMovers: QuoteSnapshot[];
  isLoading: boolean;
  onRefresh: () => void;
}

const SENTIMENT_LABELS: Record<MarketSentiment, string> = {
  STRONG_BULLISH: '🟢 Strong Bullish',
  BULLISH: '🟢 Bullish',
  MIXED: '🟡 Mixed',
  BEARISH: '🔴 Bearish',
  STRONG_BEARISH: '🔴 Strong Bearish',
};

const changeColor = (value: number): string => (value >= 0 ? 'text-emerald-400' : 'text-rose-400');

export const MarketOverview: React.FC<MarketOverviewProps> = ({
  indices,
  sectors,
  breadth,
  topMovers,
  isLoading,
  onRefresh,
}) => (
  <div className="bg-slate-800 border border-slate-700 rounded-xl p-6 shadow-lg mb-8 space-y-6">
    <div className="flex items-center justify-between">
      <div className="flex items-center gap-2">
        <Activity className="text-indigo-500" size={20} />
        <h2 className="text-lg font-semibold text-slate-100">Market Overview</h2>
        {isLoading && <Loader2 className="animate-spin text-slate-400" size={16} />}
      </div>
      <button onClick={onRefresh} className="text-slate-400 hover:text-white transition-colors">
        <RefreshCw size={18} />
      </button>
    </div>

    {/* Indices */}
    <div className="grid grid-cols-2 lg:grid-cols-4 gap-4">
      {indices.map((index) => (
        <div key={index.ticker} className="bg-slate-900/50 rounded-lg p-4">
          <span className="text-xs text-slate-400 uppercase">{index.name}</span>
          <div className="text-xl font-bold text-white">
            {index.price.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}
          </div>
          <div className={`text-xs ${changeColor(index.changePercent)}`}>
            {index.change >= 0 ? '+' : ''}{index.change.toFixed(2)} ({formatSignedPercent(index.changePercent)})
          </div>
        </div>
      ))}
    </div>

    <div className="grid grid-cols-1 lg:grid-cols-2 gap-4">
      {/* Sectors */}
      <div className="bg-slate-900/50 rounded-lg p-4">
        <h3 className="text-sm font-medium text-slate-300 mb-3">Sector Performance</h3>
        <ul className="space-y-2 text-sm">
          {sectors.map((sector) => (
            <li key={sector.sector} className="flex items-center justify-between text-slate-300">
              <span>{sector.sector}</span>
              <span className={changeColor(sector.averageChangePercent)}>
                {formatSignedPercent(sector.averageChangePercent)}
              </span>
            </li>
          ))}
        </ul>
      </div>

      {/* Breadth */}
      <div className="bg-slate-900/50 rounded-lg p-4">
        <h3 className="text-sm font-medium text-slate-300 mb-3">Market Breadth</h3>
        <div className="text-lg font-semibold text-white mb-2">{SENTIMENT_LABELS[breadth.sentiment]}</div>
        <div className="flex gap-4 text-sm">
          <span className="text-emerald-400">📈 {breadth.advancing} up</span>
          <span className="text-rose-400">📉 {breadth.declining} down</span>
          <span className="text-slate-400">{breadth.unchanged} flat</span>
        </div>
      </div>
    </div>

    {/* Top movers */}
    {topMovers.length > 0 && (
      <div>
        <h3 className="text-sm font-medium text-slate-300 mb-3">Top Movers</h3>
        <div className="grid grid-cols-2 lg:grid-cols-4 gap-4">
          {topMovers.map((quote) => (
            <div key={quote.ticker} className="bg-slate-900/50 rounded-lg p-4">
              <div className="flex items-center gap-1 text-sm font-semibold text-slate-100">
                {quote.changePercent >= 0
                  ? <TrendingUp className="text-emerald-400" size={14} />
                  : <TrendingDown className="text-rose-400" size={14} />}
                {quote.ticker}
              </div>
              <div className="text-lg font-bold text-white">${quote.price.toFixed(2)}</div>
              <div className={`text-xs ${changeColor(quote.changePercent)}`}>
                {formatSignedPercent(quote.changePercent)}
              </div>
            </div>
          ))}
        </div>
      </div>
    )}
  </div>
);
