import { StrategyConfig, SymbolMarketData, TaxConfig, DividendEvent, RunLogger } from '../src/core/types';
import { MarketDataSet } from '../src/data/loader';

export const taxConfig: TaxConfig = {
  federalOrdinary: 0.32,
  federalLtcg: 0.15,
  state: 0.06,
  qualifiedDividendPct: 0.8,
  applyWashSale: true,
  payTaxesFromExternal: false,
  withdrawalTaxRateForIra: 0.25
};

export const sequentialIds = () => {
  let n = 0;
  return () => `id-${++n}`;
};

export const quietLogger = (): RunLogger => ({ log: jest.fn(), warn: jest.fn() });

export const makeConfig = (overrides: Partial<StrategyConfig> = {}): StrategyConfig => ({
  meta: { name: 'test', notes: '' },
  universe: { symbols: ['SPY'] },
  period: { start: '2024-01-02', end: '2024-01-05', calendar: 'WEEKDAYS' },
  initialCash: 100_000,
  account: {
    type: 'TAXABLE',
    tax: taxConfig,
    contributionCaps: { enforce: true, catchUpEligible: false, ira: 7000, iraCatchUp: 1000, roth: 7000, rothCatchUp: 1000 }
  },
  dividends: { mode: 'CASH' },
  rebalancing: { type: 'CASHFLOW_ONLY' },
  lots: { method: 'HIFO' },
  frictions: { commissionPerTrade: 0, slippageBps: 0, useActualEtfEr: false },
  positionSizing: { method: 'EQUAL_WEIGHT' },
  benchmark: [],
  ...overrides
});

export const makeSymbolData = (
  symbol: string,
  closes: Record<string, number>,
  dividends: DividendEvent[] = [],
  expenseRatio = 0
): SymbolMarketData => {
  const bars = Object.entries(closes)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, close]) => ({ date, open: close, high: close, low: close, close, adjClose: close, volume: 1000 }));
  return {
    symbol,
    bars,
    dividends,
    splits: [],
    expenseRatio,
    priceByDate: new Map(bars.map((b) => [b.date, b.adjClose]))
  };
};

export const makeDataSet = (...entries: SymbolMarketData[]): MarketDataSet => new Map(entries.map((e) => [e.symbol, e]));

// Same close on every listed date.
export const flatPrices = (dates: string[], price: number): Record<string, number> =>
  Object.fromEntries(dates.map((d) => [d, price]));
