/**
 * CSV Export Utility
 *
 * Flattens a portfolio analysis into Metric,Value rows and downloads them as a CSV file.
 * Uses native browser APIs (Blob, URL) for the download.
 */

import type { PortfolioAnalysis } from '../types';
import {
  formatExclusion,
  formatMetricValue,
  formatMoney,
  formatSignedPercent,
  formatSignedRatio,
  NOT_AVAILABLE,
} from './formatters';

export interface ExportRow {
  metric: string;
  value: string;
}

/**
 * Escape a value for CSV format
 * Handles: commas, quotes, newlines
 */
export function escapeCSVValue(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }

  const stringValue = String(value);

  const needsEscaping = stringValue.includes(',') ||
    stringValue.includes('"') ||
    stringValue.includes('\n') ||
    stringValue.includes('\r');

  if (needsEscaping) {
    return `"${stringValue.replace(/"/g, '""')}"`;
  }

  return stringValue;
}

/**
 * Summary rows for one analysis, in display order
 */
export function performanceToExportRows(analysis: PortfolioAnalysis): ExportRow[] {
  const { performance, benchmark, comparison, excluded } = analysis;

  return [
    { metric: 'Initial Investment', value: formatMoney(performance.initialCapital) },
    { metric: 'Final Value', value: formatMoney(performance.finalValue) },
    { metric: 'Absolute Gain', value: formatMoney(performance.absoluteGain) },
    { metric: 'Total Return', value: formatSignedPercent(performance.totalReturnPct) },
    { metric: 'Annualized Return', value: formatSignedPercent(performance.annualizedReturnPct) },
    { metric: 'Volatility', value: formatSignedPercent(performance.volatilityPct) },
    { metric: 'Sharpe Ratio', value: formatSignedRatio(performance.sharpeRatio) },
    { metric: 'Max Drawdown', value: formatSignedPercent(performance.maxDrawdownPct) },
    { metric: 'Beta', value: formatMetricValue(performance.beta) },
    { metric: 'Correlation', value: formatMetricValue(performance.correlation) },
    {
      metric: 'Benchmark Return',
      value: benchmark ? formatSignedPercent(benchmark.performance.totalReturnPct) : NOT_AVAILABLE,
    },
    {
      metric: 'Outperformance',
      value: comparison ? formatSignedPercent(comparison.outperformancePct) : NOT_AVAILABLE,
    },
    {
      metric: 'Excluded Holdings',
      value: excluded.length > 0 ? excluded.map(formatExclusion).join('; ') : 'None',
    },
  ];
}

/**
 * Generate CSV content from export rows
 */
export function generatePerformanceCSV(rows: ExportRow[]): string {
  const lines = ['Metric,Value'];
  for (const row of rows) {
    lines.push([row.metric, row.value].map(escapeCSVValue).join(','));
  }
  return lines.join('\n');
}

/**
 * Generate a filename for the CSV export: {name}_analysis_{YYYYMMDD}.csv
 */
export function generateExportFilename(prefix: string, date: Date = new Date()): string {
  const safeName = prefix.trim().replace(/[^a-zA-Z0-9]+/g, '_').replace(/^_+|_+$/g, '') || 'portfolio';
  const dateStr = date.toISOString().slice(0, 10).replace(/-/g, '');
  return `${safeName}_analysis_${dateStr}.csv`;
}

/**
 * Download CSV content as a file
 */
export function downloadCSV(csvContent: string, filename: string): void {
  const blob = new Blob([csvContent], { type: 'text/csv;charset=utf-8;' });

  const link = document.createElement('a');
  const url = URL.createObjectURL(blob);

  link.setAttribute('href', url);
  link.setAttribute('download', filename);
  link.style.visibility = 'hidden';

  document.body.appendChild(link);
  link.click();
  document.body.removeChild(link);

  URL.revokeObjectURL(url);
}

/**
 * Export an analysis to CSV and trigger download
 */
export function exportAnalysisToCSV(analysis: PortfolioAnalysis, date: Date = new Date()): void {
  const csv = generatePerformanceCSV(performanceToExportRows(analysis));
  downloadCSV(csv, generateExportFilename(analysis.scenarioName, date));
}
