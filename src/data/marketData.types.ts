export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  adjClose: number;
  volume: number;
}

export interface DividendEvent {
  exDate: string;
  payDate?: string;
  amount: number; // per share
  qualifiedPct?: number;
}

export interface SplitEvent {
  exDate: string;
  ratio: number; // 2 = 2-for-1
}

export interface SymbolMarketData {
  symbol: string;
  bars: PriceBar[];
  dividends: DividendEvent[];
  splits: SplitEvent[];
  expenseRatio: number;
  // adjusted close by ISO date
  priceByDate: Map<string, number>;
}

export interface HistoricalDataProvider {
  getBars(symbol: string, start: string, end: string): Promise<PriceBar[]>;
  getDividends(symbol: string, start: string, end: string): Promise<DividendEvent[]>;
  getSplits(symbol: string, start: string, end: string): Promise<SplitEvent[]>;
  getExpenseRatio(symbol: string): Promise<number | undefined>;
}
