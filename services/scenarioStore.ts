/**
 * Scenario Store
 *
 * In-memory registry of hypothetical portfolios. Every mutation replaces the stored scenario with a
 * new frozen snapshot, so a scenario handed to the analysis engine never changes underneath it.
 */

import type { AnalysisPeriod, Holding, PortfolioScenario, ScenarioAllocation } from '../types';
import { FIXED_ANALYSIS_PERIODS } from '../types';
import { ScenarioError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('scenarios');

export interface HoldingInput {
  ticker: string;
  weight: number;
  shares?: number;
  purchasePrice?: number;
}

export type ScenarioListener = (scenarios: readonly PortfolioScenario[]) => void;

export interface ScenarioStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

const defaultId = (): string => Math.random().toString(36).slice(2, 11);

export const isValidAnalysisPeriod = (period: AnalysisPeriod): boolean =>
  typeof period === 'string'
    ? FIXED_ANALYSIS_PERIODS.includes(period)
    : Number.isInteger(period.days) && period.days > 0;

const freezeScenario = (scenario: PortfolioScenario): PortfolioScenario =>
  Object.freeze({
    ...scenario,
    analysisPeriod: typeof scenario.analysisPeriod === 'string'
      ? scenario.analysisPeriod
      : Object.freeze({ ...scenario.analysisPeriod }),
    holdings: Object.freeze(scenario.holdings.map((holding) => Object.freeze({ ...holding }))),
  });

export class ScenarioStore {
  private readonly scenarios = new Map<string, PortfolioScenario>();
  private readonly listeners = new Set<ScenarioListener>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor({ now = () => new Date(), generateId = defaultId }: ScenarioStoreOptions = {}) {
    this.now = now;
    this.generateId = generateId;
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /**
   * @throws ScenarioError NOT_FOUND
   */
  getScenario(id: string): PortfolioScenario {
    const scenario = this.scenarios.get(id);
    if (!scenario) {
      throw new ScenarioError('NOT_FOUND', `Scenario ${id} does not exist`);
    }
    return scenario;
  }

  listScenarios(): PortfolioScenario[] {
    return Array.from(this.scenarios.values());
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  createScenario(name: string, initialCapital: number, analysisPeriod: AnalysisPeriod = '1y'): PortfolioScenario {
    const trimmed = this.validateName(name);
    this.assertCapital(initialCapital);
    this.assertPeriod(analysisPeriod);

    const timestamp = this.now().toISOString();
    let id = this.generateId();
    while (this.scenarios.has(id)) id = this.generateId();

    const scenario = freezeScenario({
      id,
      name: trimmed,
      initialCapital,
      holdings: [],
      analysisPeriod,
      createdAt: timestamp,
      updatedAt: timestamp,
    });

    this.scenarios.set(id, scenario);
    log.info(`📁 Created scenario "${trimmed}"`);
    this.notify();
    return scenario;
  }

  renameScenario(id: string, name: string): PortfolioScenario {
    const scenario = this.getScenario(id);
    const trimmed = this.validateName(name, id);
    return this.replace({ ...scenario, name: trimmed });
  }

  setInitialCapital(id: string, initialCapital: number): PortfolioScenario {
    const scenario = this.getScenario(id);
    this.assertCapital(initialCapital);
    return this.replace({ ...scenario, initialCapital });
  }

  setAnalysisPeriod(id: string, analysisPeriod: AnalysisPeriod): PortfolioScenario {
    const scenario = this.getScenario(id);
    this.assertPeriod(analysisPeriod);
    return this.replace({ ...scenario, analysisPeriod });
  }

  deleteScenario(id: string): void {
    const scenario = this.getScenario(id);
    this.scenarios.delete(id);
    log.info(`🗑️ Deleted scenario "${scenario.name}"`);
    this.notify();
  }

  // ==========================================================================
  // HOLDINGS
  // ==========================================================================

  /**
   * Add a holding, or replace the existing one for the same ticker
   */
  addHolding(id: string, input: HoldingInput): PortfolioScenario {
    const scenario = this.getScenario(id);
    const ticker = input.ticker.trim().toUpperCase();

    if (ticker === '') {
      throw new ScenarioError('INVALID_INPUT', 'Ticker must not be empty');
    }
    if (!Number.isFinite(input.weight) || input.weight <= 0) {
      throw new ScenarioError('INVALID_INPUT', `Weight for ${ticker} must be a positive number`);
    }
    if (input.shares !== undefined && (!Number.isFinite(input.shares) || input.shares <= 0)) {
      throw new ScenarioError('INVALID_INPUT', `Shares for ${ticker} must be a positive number`);
    }
    if (input.purchasePrice !== undefined && (!Number.isFinite(input.purchasePrice) || input.purchasePrice <= 0)) {
      throw new ScenarioError('INVALID_INPUT', `Purchase price for ${ticker} must be a positive number`);
    }

    const holding: Holding = { ticker, weight: input.weight, addedAt: this.now().toISOString() };
    if (input.shares !== undefined) holding.shares = input.shares;
    if (input.purchasePrice !== undefined) holding.purchasePrice = input.purchasePrice;

    const existing = scenario.holdings.findIndex((h) => h.ticker === ticker);
    const holdings = existing === -1
      ? [...scenario.holdings, holding]
      : scenario.holdings.map((h, i) => (i === existing ? holding : h));

    return this.replace({ ...scenario, holdings });
  }

  /**
   * @throws ScenarioError NOT_FOUND when the scenario does not hold the ticker
   */
  removeHolding(id: string, ticker: string): PortfolioScenario {
    const scenario = this.getScenario(id);
    const symbol = ticker.trim().toUpperCase();

    if (!scenario.holdings.some((h) => h.ticker === symbol)) {
      throw new ScenarioError('NOT_FOUND', `Scenario "${scenario.name}" has no holding ${symbol}`);
    }

    return this.replace({ ...scenario, holdings: scenario.holdings.filter((h) => h.ticker !== symbol) });
  }

  // ==========================================================================
  // CHANGE NOTIFICATION
  // ==========================================================================

  /**
   * Register a listener called with the full scenario list after every change.
   * Returns the unsubscribe function.
   */
  subscribe(listener: ScenarioListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    const snapshot = this.listScenarios();
    this.listeners.forEach((listener) => listener(snapshot));
  }

  private replace(scenario: PortfolioScenario): PortfolioScenario {
    const updated = freezeScenario({ ...scenario, updatedAt: this.now().toISOString() });
    this.scenarios.set(updated.id, updated);
    this.notify();
    return updated;
  }

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  private validateName(name: string, ignoreId?: string): string {
    const trimmed = name.trim();
    if (trimmed === '') {
      throw new ScenarioError('INVALID_INPUT', 'Scenario name must not be empty');
    }

    const lower = trimmed.toLowerCase();
    for (const scenario of this.scenarios.values()) {
      if (scenario.id !== ignoreId && scenario.name.toLowerCase() === lower) {
        throw new ScenarioError('DUPLICATE_NAME', `A scenario named "${scenario.name}" already exists`);
      }
    }
    return trimmed;
  }

  private assertCapital(initialCapital: number): void {
    if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
      throw new ScenarioError('INVALID_INPUT', `Initial capital must be positive, got ${initialCapital}`);
    }
  }

  private assertPeriod(period: AnalysisPeriod): void {
    if (!isValidAnalysisPeriod(period)) {
      throw new ScenarioError('INVALID_INPUT', 'Analysis period must be 6mo, 1y, 2y, 5y or a positive day count');
    }
  }
}

/**
 * The allocation the analysis engine reads from a scenario
 */
export const toAllocation = (scenario: PortfolioScenario): ScenarioAllocation => ({
  weights: Object.fromEntries(scenario.holdings.map((holding) => [holding.ticker, holding.weight])),
  initialCapital: scenario.initialCapital,
  period: scenario.analysisPeriod,
});
