/**
 * Scenarios Hook
 *
 * Mirrors the ScenarioStore into React state and wraps its operations as handlers.
 * Store validation errors are caught and exposed as `error` instead of thrown into render.
 */

import { useState, useEffect, useCallback } from 'react';
import type { AnalysisPeriod, PortfolioScenario } from '../types';
import type { HoldingInput, ScenarioStore } from '../services/scenarioStore';
import { ScenarioError } from '../errors';

export interface UseScenariosResult {
  /** All scenarios in creation order */
  scenarios: PortfolioScenario[];
  /** Currently selected scenario ID ('' when there is none) */
  activeScenarioId: string;
  setActiveScenarioId: (id: string) => void;
  /** Currently selected scenario, or null */
  activeScenario: PortfolioScenario | null;
  /** Last store validation error, cleared by the next successful operation */
  error: string | null;
  clearError: () => void;
  handleCreateScenario: (name: string, initialCapital: number, period?: AnalysisPeriod) => void;
  handleRenameScenario: (id: string, name: string) => void;
  handleDeleteScenario: (id: string) => void;
  handleSetPeriod: (id: string, period: AnalysisPeriod) => void;
  handleSetInitialCapital: (id: string, initialCapital: number) => void;
  handleAddHolding: (id: string, holding: HoldingInput) => void;
  handleRemoveHolding: (id: string, ticker: string) => void;
}

/**
 * Hook for managing scenario state
 *
 * @example
 * ```tsx
 * const { scenarios, activeScenario, handleCreateScenario, handleAddHolding } = useScenarios(store);
 * ```
 */
export const useScenarios = (store: ScenarioStore): UseScenariosResult => {
  const [scenarios, setScenarios] = useState<PortfolioScenario[]>(() => store.listScenarios());
  const [activeScenarioId, setActiveScenarioId] = useState<string>(() => store.listScenarios()[0]?.id ?? '');
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    setScenarios(store.listScenarios());
    return store.subscribe((next) => setScenarios([...next]));
  }, [store]);

  // Keep the selection valid when the selected scenario is deleted
  useEffect(() => {
    if (!scenarios.some((s) => s.id === activeScenarioId)) {
      setActiveScenarioId(scenarios[0]?.id ?? '');
    }
  }, [scenarios, activeScenarioId]);

  const activeScenario = scenarios.find((s) => s.id === activeScenarioId) ?? null;

  // Run a store operation, surfacing validation failures as state
  const run = useCallback((operation: () => void) => {
    try {
      operation();
      setError(null);
    } catch (err) {
      if (err instanceof ScenarioError) {
        console.warn(`⚠️ ${err.code}: ${err.message}`);
        setError(err.message);
        return;
      }
      throw err;
    }
  }, []);

  const handleCreateScenario = useCallback(
    (name: string, initialCapital: number, period?: AnalysisPeriod) => {
      run(() => {
        const scenario = store.createScenario(name, initialCapital, period);
        setActiveScenarioId(scenario.id);
      });
    },
    [store, run]
  );

  const handleRenameScenario = useCallback(
    (id: string, name: string) => run(() => store.renameScenario(id, name)),
    [store, run]
  );

  const handleDeleteScenario = useCallback(
    (id: string) => run(() => store.deleteScenario(id)),
    [store, run]
  );

  const handleSetPeriod = useCallback(
    (id: string, period: AnalysisPeriod) => run(() => store.setAnalysisPeriod(id, period)),
    [store, run]
  );

  const handleSetInitialCapital = useCallback(
    (id: string, initialCapital: number) => run(() => store.setInitialCapital(id, initialCapital)),
    [store, run]
  );

  const handleAddHolding = useCallback(
    (id: string, holding: HoldingInput) => run(() => store.addHolding(id, holding)),
    [store, run]
  );

  const handleRemoveHolding = useCallback(
    (id: string, ticker: string) => run(() => store.removeHolding(id, ticker)),
    [store, run]
  );

  const clearError = useCallback(() => setError(null), []);

  return {
    scenarios,
    activeScenarioId,
    setActiveScenarioId,
    activeScenario,
    error,
    clearError,
    handleCreateScenario,
    handleRenameScenario,
    handleDeleteScenario,
    handleSetPeriod,
    handleSetInitialCapital,
    handleAddHolding,
    handleRemoveHolding,
  };
};
