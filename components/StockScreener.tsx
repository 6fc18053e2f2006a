/**
 * StockScreener Component
 *
 * Filters the loaded quotes by P/E, dividend yield, sector and market cap.
 * Blank inputs impose no constraint.
 */

import React, { useMemo, useState } from 'react';
import { Filter } from 'lucide-react';
import type { QuoteSnapshot, ScreeningFilters } from '../types';
import { screenStocks } from '../services/screeningService';
import { formatMarketCap, formatSignedPercent, NOT_AVAILABLE } from '../utils/formatters';

interface StockScreenerProps {
  quotes: QuoteSnapshot[];
  sectors: string[];
  onSelectTicker: (ticker: string) => void;
}

interface FilterInputs {
  minPe: string;
  maxPe: string;
  minDividendYield: string;
  sector: string;
  minMarketCap: string;
  maxMarketCap: string;
}

const EMPTY_INPUTS: FilterInputs = {
  minPe: '',
  maxPe: '',
  minDividendYield: '',
  sector: '',
  minMarketCap: '',
  maxMarketCap: '',
};

const parseBound = (raw: string): number | undefined => {
  if (raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
};

export const toScreeningFilters = (inputs: FilterInputs): ScreeningFilters => {
  const filters: ScreeningFilters = {};
  const minPe = parseBound(inputs.minPe);
  const maxPe = parseBound(inputs.maxPe);
  const minDividendYield = parseBound(inputs.minDividendYield);
  const minMarketCap = parseBound(inputs.minMarketCap);
  const maxMarketCap = parseBound(inputs.maxMarketCap);

  if (minPe !== undefined) filters.minPe = minPe;
  if (maxPe !== undefined) filters.maxPe = maxPe;
  if (minDividendYield !== undefined) filters.minDividendYield = minDividendYield;
  if (inputs.sector !== '') filters.sector = inputs.sector;
  // Market cap inputs are in billions
  if (minMarketCap !== undefined) filters.minMarketCap = minMarketCap * 1e9;
  if (maxMarketCap !== undefined) filters.maxMarketCap = maxMarketCap * 1e9;
  return filters;
};

const NUMERIC_FIELDS: Array<{ key: Exclude<keyof FilterInputs, 'sector'>; label: string }> = [
  { key: 'minPe', label: 'Min P/E' },
  { key: 'maxPe', label: 'Max P/E' },
  { key: 'minDividendYield', label: 'Min Yield %' },
  { key: 'minMarketCap', label: 'Min Cap ($B)' },
  { key: 'maxMarketCap', label: 'Max Cap ($B)' },
];

export const StockScreener: React.FC<StockScreenerProps> = ({ quotes, sectors, onSelectTicker }) => {
  const [inputs, setInputs] = useState<FilterInputs>(EMPTY_INPUTS);

  const results = useMemo(() => screenStocks(quotes, toScreeningFilters(inputs)), [quotes, inputs]);

  return (
    <div className="bg-slate-800 border border-slate-700 rounded-xl p-6 shadow-lg mb-8">
      <div className="flex items-center gap-2 mb-4">
        <Filter className="text-indigo-500" size={20} />
        <h2 className="text-lg font-semibold text-slate-100">Stock Screener</h2>
        <span className="text-xs text-slate-500">{results.length} of {quotes.length}</span>
      </div>

      <div className="grid grid-cols-2 md:grid-cols-3 lg:grid-cols-6 gap-2 mb-4">
        {NUMERIC_FIELDS.map(({ key, label }) => (
          <input
            key={key}
            type="number"
            step="any"
            placeholder={label}
            value={inputs[key]}
            onChange={(e) => setInputs({ ...inputs, [key]: e.target.value })}
            className="bg-slate-900 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-100"
          />
        ))}
        <select
          value={inputs.sector}
          onChange={(e) => setInputs({ ...inputs, sector: e.target.value })}
          className="bg-slate-900 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-100"
        >
          <option value="">All sectors</option>
          {sectors.map((sector) => (
            <option key={sector} value={sector}>{sector}</option>
          ))}
        </select>
      </div>

      <div className="overflow-x-auto">
        <table className="w-full text-xs">
          <thead className="text-slate-500 border-b border-slate-700">
            <tr>
              <th className="text-left py-2 px-2">Ticker</th>
              <th className="text-left py-2 px-2">Company</th>
              <th className="text-right py-2 px-2">Price</th>
              <th className="text-right py-2 px-2">Change</th>
              <th className="text-right py-2 px-2">P/E</th>
              <th className="text-right py-2 px-2">Yield</th>
              <th className="text-right py-2 px-2">Market Cap</th>
              <th className="text-left py-2 px-2">Sector</th>
            </tr>
          </thead>
          <tbody className="divide-y divide-slate-700/30">
            {results.map((quote) => (
              <tr
                key={quote.ticker}
                className="text-slate-300 hover:bg-slate-800/50 cursor-pointer"
                onClick={() => onSelectTicker(quote.ticker)}
              >
                <td className="py-2 px-2 font-medium">{quote.ticker}</td>
                <td className="py-2 px-2">{quote.companyName}</td>
                <td className="text-right py-2 px-2">${quote.price.toFixed(2)}</td>
                <td className={`text-right py-2 px-2 ${quote.changePercent >= 0 ? 'text-emerald-400' : 'text-rose-400'}`}>
                  {formatSignedPercent(quote.changePercent)}
                </td>
                <td className="text-right py-2 px-2">{quote.peRatio?.toFixed(1) ?? NOT_AVAILABLE}</td>
                <td className="text-right py-2 px-2">
                  {quote.dividendYield !== null ? `${quote.dividendYield.toFixed(2)}%` : NOT_AVAILABLE}
                </td>
                <td className="text-right py-2 px-2">{formatMarketCap(quote.marketCap)}</td>
                <td className="py-2 px-2">{quote.sector ?? NOT_AVAILABLE}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
};
