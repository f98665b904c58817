export { PriceBar, DividendEvent, SplitEvent, SymbolMarketData } from '../data/marketData.types';

export type AccountType = 'TAXABLE' | 'TRADITIONAL_IRA' | 'ROTH_IRA' | 'PLAN_529';
export type LotMethod = 'FIFO' | 'LIFO' | 'HIFO';
export type TradeSide = 'BUY' | 'SELL';
export type TradeAction = 'BUY' | 'SELL' | 'DRIP' | 'DIVIDEND';
export type DividendMode = 'DRIP' | 'CASH';
export type RebalanceType = 'CALENDAR' | 'DRIFT' | 'BOTH' | 'CASHFLOW_ONLY';
export type CalendarPeriod = 'D' | 'W' | 'M' | 'Q' | 'Y';
export type DepositCadence = 'none' | 'daily' | 'weekly' | 'monthly' | 'quarterly' | 'yearly' | 'every_market_day';
export type SizingMethod = 'EQUAL_WEIGHT' | 'CUSTOM_WEIGHTS';
export type CalendarSource = 'SESSIONS' | 'WEEKDAYS';

export interface Lot {
  lotId: string;
  symbol: string;
  quantity: number; // remaining shares
  costBasis: number; // remaining total basis, commission and slippage included
  acquisitionDate: string;
  isWashSale: boolean;
  washSaleDisallowed: number;
}

export interface Trade {
  readonly tradeId: string;
  readonly date: string;
  readonly symbol: string;
  readonly action: TradeAction;
  readonly quantity: number;
  readonly price: number;
  readonly commission: number;
  readonly slippage: number;
  // signed from the account's point of view: negative when cash leaves
  readonly cashImpact: number;
  readonly lotIds: readonly string[];
  readonly notes?: string;
}

export interface Position {
  symbol: string;
  quantity: number;
  marketValue: number;
  costBasis: number;
  unrealizedGain: number;
  lots: Lot[];
}

export interface WashSaleRecord {
  symbol: string;
  date: string;
  lotId: string;
  disallowedLoss: number;
}

export interface YearAccumulator {
  contributions: number;
  realizedShortTerm: number;
  realizedLongTerm: number;
  qualifiedDividends: number;
  ordinaryDividends: number;
  interestIncome: number;
  taxesPaid: number;
}

export interface TradeIntent {
  symbol: string;
  side: TradeSide;
  quantity: number;
}

export interface TaxSummary {
  year: number;
  shortTermGains: number;
  longTermGains: number;
  qualifiedDividends: number;
  ordinaryDividends: number;
  interestIncome: number;
  totalTax: number;
  washSaleCount: number;
}

export interface TaxConfig {
  federalOrdinary: number;
  federalLtcg: number;
  state: number;
  qualifiedDividendPct: number;
  applyWashSale: boolean;
  payTaxesFromExternal: boolean;
  withdrawalTaxRateForIra: number;
}

export interface ContributionCaps {
  enforce: boolean;
  catchUpEligible: boolean;
  ira: number;
  iraCatchUp: number;
  roth: number;
  rothCatchUp: number;
}

export interface AccountConfig {
  type: AccountType;
  tax: TaxConfig;
  contributionCaps: ContributionCaps;
}

export interface DepositConfig {
  cadence: DepositCadence;
  amount: number;
}

export interface RebalancingConfig {
  type: RebalanceType;
  calendar?: { period: CalendarPeriod };
  drift?: { absPct?: number; relPct?: number };
}

export interface FrictionsConfig {
  commissionPerTrade: number;
  slippageBps: number;
  useActualEtfEr: boolean;
}

export interface StrategyConfig {
  meta: { name: string; notes: string };
  universe: { symbols: string[]; weights?: Record<string, number> };
  period: { start: string; end: string; calendar: CalendarSource };
  initialCash: number;
  account: AccountConfig;
  deposits?: DepositConfig;
  dividends: { mode: DividendMode };
  rebalancing: RebalancingConfig;
  lots: { method: LotMethod };
  frictions: FrictionsConfig;
  positionSizing: { method: SizingMethod; customWeights?: Record<string, number> };
  benchmark: string[];
}

export interface EquityPoint {
  date: string;
  portfolioValue: number;
  cash: number;
  positionsValue: number;
}

export interface BenchmarkPoint {
  date: string;
  value: number;
}

export interface TaxDragEntry {
  year: number;
  taxPaid: number;
  yearEndValue: number;
  dragPct: number;
}

export interface BacktestDiagnostics {
  totalTrades: number;
  totalSymbols: number;
  tradingDays: number;
  simulatedDays: number;
  totalDeposits: number;
  totalTaxesPaid: number;
}

export interface BacktestResult {
  config: StrategyConfig;
  equityCurve: EquityPoint[];
  trades: Trade[];
  lots: Lot[];
  finalPositions: Position[];
  taxSummaries: TaxSummary[];
  taxDrag: TaxDragEntry[];
  afterTaxValue: number;
  benchmarkEquity: Record<string, BenchmarkPoint[]>;
  warnings: string[];
  diagnostics: BacktestDiagnostics;
}

export interface ProgressUpdate {
  dayIndex: number;
  totalDays: number;
  date: string;
  portfolioValue: number;
}

export type RunLogger = Pick<Console, 'log' | 'warn'>;
