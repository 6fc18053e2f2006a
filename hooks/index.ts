/**
 * Hooks barrel export
 */

export * from './useMarketOverview';
export * from './usePortfolioAnalysis';
export * from './useScenarios';
export * from './useStockDetail';
