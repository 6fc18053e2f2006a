import React, { useState } from 'react';
import type { AnalysisPeriod, MetricValue, PortfolioAnalysis } from '../types';
import { FIXED_ANALYSIS_PERIODS } from '../types';
import {
  formatCurrency,
  formatExclusion,
  formatMetricValue,
  formatPeriodLabel,
  formatSignedPercent,
  formatSignedRatio,
} from '../utils/formatters';
import { exportAnalysisToCSV } from '../utils/csvExport';
import { TrendingUp, ChevronDown, ChevronUp, Loader2, Download, RefreshCw } from 'lucide-react';

interface PerformanceMetricsProps {
  analysis: PortfolioAnalysis | null;
  isLoading: boolean;
  error: string | null;
  period: AnalysisPeriod;
  onPeriodChange: (period: AnalysisPeriod) => void;
  onRefresh: () => void;
}

const changeColor = (value: number): string => (value >= 0 ? 'text-emerald-400' : 'text-rose-400');

const metricTitle = (metric: MetricValue): string | undefined =>
  metric.status === 'unavailable' ? metric.message : undefined;

export const PerformanceMetrics: React.FC<PerformanceMetricsProps> = ({
  analysis,
  isLoading,
  error,
  period,
  onPeriodChange,
  onRefresh,
}) => {
  const [isExpanded, setIsExpanded] = useState(true);

  const performance = analysis?.performance;

  return (
    <div className="bg-slate-800 border border-slate-700 rounded-xl p-6 shadow-lg mb-8">
      {/* Header */}
      <div className="flex items-center justify-between">
        <div className="flex items-center gap-2">
          <TrendingUp className="text-indigo-500" size={20} />
          <h2 className="text-lg font-semibold text-slate-100">Performance Analysis</h2>
          {isLoading && <Loader2 className="animate-spin text-slate-400" size={16} />}
        </div>
        <div className="flex items-center gap-3">
          <button
            onClick={onRefresh}
            className="text-slate-400 hover:text-white transition-colors"
            title="Recalculate"
          >
            <RefreshCw size={18} />
          </button>
          {analysis && (
            <button
              onClick={() => exportAnalysisToCSV(analysis)}
              className="text-slate-400 hover:text-white transition-colors"
              title="Export to CSV"
            >
              <Download size={18} />
            </button>
          )}
          <button
            onClick={() => setIsExpanded(!isExpanded)}
            className="text-slate-400 hover:text-white transition-colors"
          >
            {isExpanded ? <ChevronUp size={20} /> : <ChevronDown size={20} />}
          </button>
        </div>
      </div>

      {/* Collapsed Summary */}
      {!isExpanded && performance && (
        <div className="mt-4 flex items-center gap-4 text-sm text-slate-300">
          <span>Return: {formatSignedPercent(performance.totalReturnPct)}</span>
          <span>•</span>
          <span>Volatility: {performance.volatilityPct.toFixed(1)}%</span>
          <span>•</span>
          <span>Max DD: {performance.maxDrawdownPct.toFixed(1)}%</span>
        </div>
      )}

      {isExpanded && (
        <div className="space-y-4 mt-4">
          {/* Time Period Selector */}
          <div className="flex items-center gap-2">
            <span className="text-xs text-slate-400">Analysis Period:</span>
            <div className="flex items-center bg-slate-900 rounded-lg p-1">
              {FIXED_ANALYSIS_PERIODS.map((p) => (
                <button
                  key={p}
                  onClick={() => onPeriodChange(p)}
                  className={`text-[10px] font-bold px-3 py-1 rounded transition-colors ${
                    period === p ? 'bg-indigo-600 text-white' : 'text-slate-500 hover:text-slate-300'
                  }`}
                >
                  {formatPeriodLabel(p)}
                </button>
              ))}
            </div>
          </div>

          {error && (
            <div className="bg-rose-500/10 border border-rose-500/20 rounded-lg p-4">
              <p className="text-rose-200 text-sm">{error}</p>
            </div>
          )}

          {!analysis && !isLoading && !error && (
            <div className="bg-amber-500/10 border border-amber-500/20 rounded-lg p-4">
              <p className="text-amber-200 text-sm">Add holdings to this scenario to see its performance.</p>
            </div>
          )}

          {analysis?.degraded && (
            <div className="bg-amber-500/10 border border-amber-500/20 rounded-lg p-4">
              <p className="text-amber-200 text-sm">
                Computed without {analysis.excluded.map(formatExclusion).join(', ')}; remaining weights were rescaled.
              </p>
            </div>
          )}

          {analysis && performance && (
            <>
              <div className="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-4 gap-4">
                {/* Return Card */}
                <div className="bg-slate-900/50 rounded-lg p-4" title="Compounded return of the daily-rebalanced portfolio over the period.">
                  <span className="text-xs text-slate-400 uppercase">Total Return</span>
                  <div className={`text-2xl font-bold ${changeColor(performance.totalReturnPct)}`}>
                    {formatSignedPercent(performance.totalReturnPct)}
                  </div>
                  <div className="text-xs text-slate-400 mt-1">
                    {formatCurrency(performance.initialCapital)} → {formatCurrency(performance.finalValue)}
                  </div>
                  <div className="text-xs text-slate-500 mt-2">
                    Annualized: {formatSignedPercent(performance.annualizedReturnPct)}
                  </div>
                </div>

                {/* Volatility Card */}
                <div className="bg-slate-900/50 rounded-lg p-4" title="Annualized sample standard deviation of daily returns.">
                  <span className="text-xs text-slate-400 uppercase">Volatility</span>
                  <div className="text-2xl font-bold text-white">{performance.volatilityPct.toFixed(2)}%</div>
                  <div className="text-xs text-slate-400 mt-1">{performance.observations} trading days</div>
                  <div className="text-xs text-slate-500 mt-2" title="Annualized return over annualized volatility.">
                    Sharpe: {formatSignedRatio(performance.sharpeRatio)}
                  </div>
                </div>

                {/* Max Drawdown Card */}
                <div className="bg-slate-900/50 rounded-lg p-4" title="Largest peak-to-trough decline of the portfolio value.">
                  <span className="text-xs text-slate-400 uppercase">Maximum Drawdown</span>
                  <div className="text-2xl font-bold text-rose-400">{performance.maxDrawdownPct.toFixed(2)}%</div>
                  <div className="text-xs text-slate-400 mt-1">
                    {performance.drawdownPeriod
                      ? `${performance.drawdownPeriod.peakDate} → ${performance.drawdownPeriod.troughDate}`
                      : 'No decline'}
                  </div>
                </div>

                {/* Benchmark Card */}
                <div className="bg-slate-900/50 rounded-lg p-4">
                  <span className="text-xs text-slate-400 uppercase">
                    vs {analysis.benchmark ? analysis.benchmark.name : 'Benchmark'}
                  </span>
                  <div className={`text-2xl font-bold ${analysis.comparison ? changeColor(analysis.comparison.outperformancePct) : 'text-slate-500'}`}>
                    {analysis.comparison ? formatSignedPercent(analysis.comparison.outperformancePct) : 'N/A'}
                  </div>
                  <div className="text-xs text-slate-400 mt-1">
                    <span title={metricTitle(performance.beta)}>Beta: {formatMetricValue(performance.beta)}</span>
                    {' • '}
                    <span title={metricTitle(performance.correlation)}>Corr: {formatMetricValue(performance.correlation)}</span>
                  </div>
                  {analysis.comparison && (
                    <div className="text-xs text-slate-500 mt-2">
                      Sharpe difference: {formatSignedRatio(analysis.comparison.riskAdjustedOutperformance)}
                    </div>
                  )}
                </div>
              </div>

              {/* Holdings Breakdown */}
              <div className="bg-slate-900/50 rounded-lg p-4">
                <h3 className="text-sm font-medium text-slate-300 mb-3">Holdings Breakdown</h3>
                <div className="overflow-x-auto">
                  <table className="w-full text-xs">
                    <thead className="text-slate-500 border-b border-slate-700">
                      <tr>
                        <th className="text-left py-2 px-2">Ticker</th>
                        <th className="text-right py-2 px-2">Allocation</th>
                        <th className="text-right py-2 px-2">Initial</th>
                        <th className="text-right py-2 px-2">Return</th>
                        <th className="text-right py-2 px-2">Final</th>
                        <th className="text-right py-2 px-2">Contribution</th>
                      </tr>
                    </thead>
                    <tbody className="divide-y divide-slate-700/30">
                      {[...analysis.holdings]
                        .sort((a, b) => b.allocationPct - a.allocationPct)
                        .map((holding) => (
                          <tr key={holding.ticker} className="text-slate-300 hover:bg-slate-800/50">
                            <td className="py-2 px-2 font-medium">{holding.ticker}</td>
                            <td className="text-right py-2 px-2">{holding.allocationPct.toFixed(1)}%</td>
                            <td className="text-right py-2 px-2">{formatCurrency(holding.initialValue)}</td>
                            <td className={`text-right py-2 px-2 ${changeColor(holding.totalReturnPct)}`}>
                              {formatSignedPercent(holding.totalReturnPct)}
                            </td>
                            <td className="text-right py-2 px-2">{formatCurrency(holding.finalValue)}</td>
                            <td className="text-right py-2 px-2">{formatSignedPercent(holding.contribution)}</td>
                          </tr>
                        ))}
                    </tbody>
                  </table>
                </div>
              </div>

              <div className="text-xs text-slate-500 italic border-l-2 border-indigo-500/30 pl-3">
                ℹ️ {formatPeriodLabel(analysis.period)} of daily closes, rebalanced daily to target weights.
                Computed {new Date(analysis.computedAt).toLocaleString()}.
              </div>
            </>
          )}
        </div>
      )}
    </div>
  );
};
