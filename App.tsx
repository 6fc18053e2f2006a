import React, { useState } from 'react';
import { BarChart3, Briefcase, Globe } from 'lucide-react';
import type { QuoteSnapshot } from './types';
import { resolveConfig } from './config';
import { setLogLevel } from './utils/logger';
import { CachedMarketDataProvider, YahooFinanceProvider } from './services/marketDataService';
import { ScenarioStore } from './services/scenarioStore';
import { MARKET_UNIVERSE } from './services/screeningService';
import { useMarketOverview, usePortfolioAnalysis, useScenarios, useStockDetail } from './hooks';
import { ScenarioManager } from './components/ScenarioManager';
import { PerformanceMetrics } from './components/PerformanceMetrics';
import { MarketOverview } from './components/MarketOverview';
import { StockScreener } from './components/StockScreener';
import { StockDetail } from './components/StockDetail';

// The browser needs the CORS proxies unless the environment says otherwise
const config = resolveConfig({ VITE_USE_CORS_PROXY: 'true', ...import.meta.env });
setLogLevel(config.logLevel);

const provider = new CachedMarketDataProvider(
  new YahooFinanceProvider({ useCorsProxy: config.useCorsProxy }),
  {
    quoteTtlMs: config.quoteCacheTtlMs,
    historyTtlMs: config.historyCacheTtlMs,
    maxEntries: config.maxCacheEntries,
  }
);

const store = new ScenarioStore();

type View = 'portfolio' | 'market';

const App: React.FC = () => {
  const [view, setView] = useState<View>('portfolio');
  const [selectedTicker, setSelectedTicker] = useState<string | null>(null);

  // Scenario state (mirrors the store)
  const {
    scenarios,
    activeScenario,
    setActiveScenarioId,
    error: scenarioError,
    clearError,
    handleCreateScenario,
    handleRenameScenario,
    handleDeleteScenario,
    handleSetPeriod,
    handleSetInitialCapital,
    handleAddHolding,
    handleRemoveHolding,
  } = useScenarios(store);

  const { analysis, isLoading: isAnalyzing, error: analysisError, refresh: refreshAnalysis } = usePortfolioAnalysis({
    scenario: activeScenario,
    provider,
    config,
  });

  const market = useMarketOverview({ provider, config });

  const stock = useStockDetail({
    provider,
    ticker: selectedTicker,
    period: '1y',
    timeoutMs: config.providerTimeoutMs,
  });

  const screeningQuotes = MARKET_UNIVERSE.screening
    .map((ticker) => market.quotes.get(ticker))
    .filter((quote): quote is QuoteSnapshot => quote !== undefined);

  return (
    <div className="min-h-screen bg-slate-900 text-slate-100">
      {/* Header */}
      <header className="border-b border-slate-800 bg-slate-900/80 backdrop-blur sticky top-0 z-40">
        <div className="max-w-7xl mx-auto px-4 py-4 flex items-center justify-between">
          <div className="flex items-center gap-2">
            <BarChart3 className="text-indigo-500" size={24} />
            <h1 className="text-xl font-bold">Equity Dashboard</h1>
          </div>
          <nav className="flex items-center bg-slate-800 rounded-lg p-1">
            <button
              onClick={() => setView('portfolio')}
              className={`flex items-center gap-1 text-sm px-3 py-1.5 rounded transition-colors ${
                view === 'portfolio' ? 'bg-indigo-600 text-white' : 'text-slate-400 hover:text-white'
              }`}
            >
              <Briefcase size={16} /> Portfolio
            </button>
            <button
              onClick={() => setView('market')}
              className={`flex items-center gap-1 text-sm px-3 py-1.5 rounded transition-colors ${
                view === 'market' ? 'bg-indigo-600 text-white' : 'text-slate-400 hover:text-white'
              }`}
            >
              <Globe size={16} /> Market
            </button>
          </nav>
        </div>
      </header>

      <main className="max-w-7xl mx-auto px-4 py-8">
        {view === 'portfolio' && (
          <div className="grid grid-cols-1 lg:grid-cols-3 gap-8">
            <div className="lg:col-span-1">
              <ScenarioManager
                scenarios={scenarios}
                activeScenario={activeScenario}
                error={scenarioError}
                onSelect={setActiveScenarioId}
                onCreate={handleCreateScenario}
                onRename={handleRenameScenario}
                onDelete={handleDeleteScenario}
                onSetInitialCapital={handleSetInitialCapital}
                onAddHolding={handleAddHolding}
                onRemoveHolding={handleRemoveHolding}
                onDismissError={clearError}
              />
            </div>
            <div className="lg:col-span-2">
              {activeScenario ? (
                <PerformanceMetrics
                  analysis={analysis}
                  isLoading={isAnalyzing}
                  error={analysisError}
                  period={activeScenario.analysisPeriod}
                  onPeriodChange={(period) => handleSetPeriod(activeScenario.id, period)}
                  onRefresh={refreshAnalysis}
                />
              ) : (
                <div className="bg-slate-800 border border-slate-700 rounded-xl p-6 text-slate-400 text-sm">
                  Create a scenario to start analyzing a hypothetical portfolio.
                </div>
              )}
            </div>
          </div>
        )}

        {view === 'market' && (
          <>
            <MarketOverview
              indices={market.indices}
              sectors={market.sectors}
              breadth={market.breadth}
              topMovers={market.topMovers}
              isLoading={market.isLoading}
              onRefresh={market.refresh}
            />
            {selectedTicker && (
              <StockDetail
                ticker={selectedTicker}
                quote={stock.quote}
                history={stock.history}
                indicators={stock.indicators}
                isLoading={stock.isLoading}
                error={stock.error}
                onClose={() => setSelectedTicker(null)}
              />
            )}
            <StockScreener
              quotes={screeningQuotes}
              sectors={Object.keys(MARKET_UNIVERSE.sectors)}
              onSelectTicker={setSelectedTicker}
            />
            {market.failedTickers.length > 0 && (
              <p className="text-xs text-slate-500">Unavailable: {market.failedTickers.join(', ')}</p>
            )}
          </>
        )}
      </main>
    </div>
  );
};

export default App;
