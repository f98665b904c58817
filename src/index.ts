export * from './core/types';
export * from './core/errors';
export { strategyConfigSchema, validateStrategyConfig, parseStrategyConfig, assertRunnableConfig } from './core/schema';
export type { StrategyConfigInput } from './core/schema';
export { WeekdayCalendar, calendarFromSessions } from './calendar/tradingCalendar';
export type { TradingCalendar, AlignRule } from './calendar/tradingCalendar';
export type { HistoricalDataProvider } from './data/marketData.types';
export { getDataProvider, StubDataProvider, CsvDataProvider } from './data/marketData';
export { loadMarketData } from './data/loader';
export type { MarketDataSet, DateRange } from './data/loader';
export { Portfolio } from './ledger/portfolio';
export type { PortfolioOptions } from './ledger/portfolio';
export { orderLotsForSale, selectLotsForSale } from './ledger/lotSelection';
export { Rebalancer } from './execution/rebalancer';
export type { RebalanceDecision, RebalanceReason } from './execution/rebalancer';
export { executeTradeIntents } from './execution/tradeExecutor';
export { TaxCalculator } from './tax/taxCalculator';
export { computeTargetWeights } from './engine/weights';
export { runBacktest, simulateStrategy } from './engine/runner';
export type { RunOptions, SimulationInput } from './engine/runner';
export { compareAccountTypes, ALL_ACCOUNT_TYPES } from './engine/compare';
export { summarizeResult, formatSummary } from './analytics/summary';
export type { BacktestSummary } from './analytics/summary';
export { writeBacktestReports } from './report/exportReports';
