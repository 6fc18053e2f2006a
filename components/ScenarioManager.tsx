/**
 * ScenarioManager Component
 *
 * Sidebar panel for hypothetical portfolios:
 * - Create, select, rename and delete scenarios
 * - Change the initial capital of the active scenario
 * - Add or replace holdings (ticker + allocation)
 * - Remove holdings
 */

import React, { useState } from 'react';
import { FolderOpen, Plus, Pencil, Trash2, X, Check, AlertCircle } from 'lucide-react';
import type { PortfolioScenario } from '../types';
import type { HoldingInput } from '../services/scenarioStore';
import { formatCurrency, formatPeriodLabel } from '../utils/formatters';

interface ScenarioManagerProps {
  scenarios: PortfolioScenario[];
  activeScenario: PortfolioScenario | null;
  error: string | null;
  onSelect: (id: string) => void;
  onCreate: (name: string, initialCapital: number) => void;
  onRename: (id: string, name: string) => void;
  onDelete: (id: string) => void;
  onSetInitialCapital: (id: string, initialCapital: number) => void;
  onAddHolding: (id: string, holding: HoldingInput) => void;
  onRemoveHolding: (id: string, ticker: string) => void;
  onDismissError: () => void;
}

const DEFAULT_CAPITAL = 10000;

export const ScenarioManager: React.FC<ScenarioManagerProps> = ({
  scenarios,
  activeScenario,
  error,
  onSelect,
  onCreate,
  onRename,
  onDelete,
  onSetInitialCapital,
  onAddHolding,
  onRemoveHolding,
  onDismissError,
}) => {
  const [newName, setNewName] = useState('');
  const [newCapital, setNewCapital] = useState(String(DEFAULT_CAPITAL));
  const [renamingId, setRenamingId] = useState<string | null>(null);
  const [renameValue, setRenameValue] = useState('');
  // null while the field shows the scenario's own capital
  const [capitalDraft, setCapitalDraft] = useState<string | null>(null);
  const [ticker, setTicker] = useState('');
  const [weight, setWeight] = useState('');

  const handleCreate = (e: React.FormEvent) => {
    e.preventDefault();
    onCreate(newName, Number(newCapital));
    setNewName('');
  };

  const handleRenameSubmit = (id: string) => {
    onRename(id, renameValue);
    setRenamingId(null);
  };

  const handleSetCapital = (e: React.FormEvent) => {
    e.preventDefault();
    if (!activeScenario || capitalDraft === null) return;
    onSetInitialCapital(activeScenario.id, Number(capitalDraft));
    setCapitalDraft(null);
  };

  const handleAddHolding = (e: React.FormEvent) => {
    e.preventDefault();
    if (!activeScenario) return;
    onAddHolding(activeScenario.id, { ticker, weight: Number(weight) });
    setTicker('');
    setWeight('');
  };

  const totalWeight = activeScenario?.holdings.reduce((sum, h) => sum + h.weight, 0) ?? 0;

  return (
    <div className="bg-slate-800 border border-slate-700 rounded-xl p-6 shadow-lg space-y-6">
      <div className="flex items-center gap-2">
        <FolderOpen className="text-indigo-500" size={20} />
        <h2 className="text-lg font-semibold text-slate-100">Scenarios</h2>
      </div>

      {error && (
        <div className="flex items-start gap-2 bg-rose-500/10 border border-rose-500/20 rounded-lg p-3">
          <AlertCircle className="text-rose-400 shrink-0" size={16} />
          <p className="text-rose-200 text-sm flex-1">{error}</p>
          <button onClick={onDismissError} className="text-rose-300 hover:text-white">
            <X size={14} />
          </button>
        </div>
      )}

      {/* Create */}
      <form onSubmit={handleCreate} className="space-y-2">
        <input
          value={newName}
          onChange={(e) => setNewName(e.target.value)}
          placeholder="Scenario name"
          className="w-full bg-slate-900 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-100"
        />
        <div className="flex gap-2">
          <input
            type="number"
            min="1"
            value={newCapital}
            onChange={(e) => setNewCapital(e.target.value)}
            className="flex-1 bg-slate-900 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-100"
            title="Initial capital"
          />
          <button
            type="submit"
            className="flex items-center gap-1 bg-indigo-600 hover:bg-indigo-500 text-white text-sm px-3 py-2 rounded-lg"
          >
            <Plus size={16} /> Create
          </button>
        </div>
      </form>

      {/* List */}
      <ul className="space-y-1">
        {scenarios.map((scenario) => (
          <li
            key={scenario.id}
            className={`flex items-center justify-between rounded-lg px-3 py-2 text-sm cursor-pointer ${
              scenario.id === activeScenario?.id ? 'bg-indigo-600/20 text-white' : 'text-slate-300 hover:bg-slate-700/50'
            }`}
            onClick={() => {
              onSelect(scenario.id);
              setCapitalDraft(null);
            }}
          >
            {renamingId === scenario.id ? (
              <div className="flex items-center gap-1 flex-1" onClick={(e) => e.stopPropagation()}>
                <input
                  value={renameValue}
                  onChange={(e) => setRenameValue(e.target.value)}
                  className="flex-1 bg-slate-900 border border-slate-700 rounded px-2 py-1 text-sm text-slate-100"
                />
                <button onClick={() => handleRenameSubmit(scenario.id)} className="text-emerald-400">
                  <Check size={14} />
                </button>
                <button onClick={() => setRenamingId(null)} className="text-slate-400">
                  <X size={14} />
                </button>
              </div>
            ) : (
              <>
                <div>
                  <div className="font-medium">{scenario.name}</div>
                  <div className="text-xs text-slate-500">
                    {formatCurrency(scenario.initialCapital)} • {formatPeriodLabel(scenario.analysisPeriod)} • {scenario.holdings.length} holdings
                  </div>
                </div>
                <div className="flex items-center gap-2" onClick={(e) => e.stopPropagation()}>
                  <button
                    onClick={() => {
                      setRenamingId(scenario.id);
                      setRenameValue(scenario.name);
                    }}
                    className="text-slate-400 hover:text-white"
                  >
                    <Pencil size={14} />
                  </button>
                  <button
                    onClick={() => {
                      if (window.confirm(`Delete "${scenario.name}"?`)) onDelete(scenario.id);
                    }}
                    className="text-slate-400 hover:text-rose-400"
                  >
                    <Trash2 size={14} />
                  </button>
                </div>
              </>
            )}
          </li>
        ))}
      </ul>

      {/* Holdings */}
      {activeScenario && (
        <div className="space-y-3">
          <form onSubmit={handleSetCapital} className="flex gap-2">
            <input
              type="number"
              min="1"
              step="any"
              value={capitalDraft ?? String(activeScenario.initialCapital)}
              onChange={(e) => setCapitalDraft(e.target.value)}
              className="flex-1 bg-slate-900 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-100"
              title="Initial capital"
            />
            <button
              type="submit"
              disabled={capitalDraft === null}
              className="flex items-center gap-1 bg-slate-700 hover:bg-slate-600 disabled:opacity-50 text-white text-sm px-3 py-2 rounded-lg"
            >
              <Check size={16} /> Set capital
            </button>
          </form>
          <h3 className="text-sm font-medium text-slate-300">Holdings</h3>
          <form onSubmit={handleAddHolding} className="flex gap-2">
            <input
              value={ticker}
              onChange={(e) => setTicker(e.target.value)}
              placeholder="Ticker"
              className="w-24 bg-slate-900 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-100 uppercase"
            />
            <input
              type="number"
              min="0"
              step="any"
              value={weight}
              onChange={(e) => setWeight(e.target.value)}
              placeholder="Weight %"
              className="flex-1 bg-slate-900 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-100"
            />
            <button type="submit" className="bg-indigo-600 hover:bg-indigo-500 text-white px-3 rounded-lg">
              <Plus size={16} />
            </button>
          </form>
          <ul className="divide-y divide-slate-700/30 text-sm">
            {activeScenario.holdings.map((holding) => (
              <li key={holding.ticker} className="flex items-center justify-between py-2 text-slate-300">
                <span className="font-medium">{holding.ticker}</span>
                <span className="text-slate-400">
                  {holding.weight}
                  {totalWeight > 0 && ` (${((holding.weight / totalWeight) * 100).toFixed(1)}%)`}
                </span>
                <button
                  onClick={() => onRemoveHolding(activeScenario.id, holding.ticker)}
                  className="text-slate-500 hover:text-rose-400"
                >
                  <X size={14} />
                </button>
              </li>
            ))}
          </ul>
        </div>
      )}
    </div>
  );
};
