import { errorMessage } from '../core/errors';
import { RunLogger } from '../core/types';
import { HistoricalDataProvider, SymbolMarketData } from './marketData.types';

export interface DateRange {
  start: string;
  end: string;
}

export type MarketDataSet = Map<string, SymbolMarketData>;

const loadSymbol = async (
  provider: HistoricalDataProvider,
  symbol: string,
  { start, end }: DateRange
): Promise<SymbolMarketData> => {
  const [bars, dividends, splits, expenseRatio] = await Promise.all([
    provider.getBars(symbol, start, end),
    provider.getDividends(symbol, start, end),
    provider.getSplits(symbol, start, end),
    provider.getExpenseRatio(symbol)
  ]);
  const priceByDate = new Map<string, number>();
  for (const bar of bars) priceByDate.set(bar.date, bar.adjClose);
  return { symbol, bars, dividends, splits, expenseRatio: expenseRatio ?? 0, priceByDate };
};

/**
 * Fetches every symbol up front, concurrently. A symbol that fails or returns no bars is
 * dropped with a warning; losing all of them is fatal.
 */
export const loadMarketData = async (
  provider: HistoricalDataProvider,
  symbols: string[],
  range: DateRange,
  warnings: string[],
  logger: RunLogger = console
): Promise<MarketDataSet> => {
  const unique = Array.from(new Set(symbols));
  logger.log(`Loading market data for ${unique.join(', ')} (${range.start} to ${range.end})`);
  const results = await Promise.all(
    unique.map(async (symbol) => {
      try {
        return await loadSymbol(provider, symbol, range);
      } catch (err) {
        warnings.push(`Failed to load data for ${symbol}: ${errorMessage(err)}`);
        return undefined;
      }
    })
  );

  const data: MarketDataSet = new Map();
  for (const entry of results) {
    if (!entry) continue;
    if (!entry.bars.length) {
      warnings.push(`No price data for ${entry.symbol} between ${range.start} and ${range.end}`);
      continue;
    }
    data.set(entry.symbol, entry);
  }
  if (!data.size) {
    throw new Error('No market data loaded');
  }
  return data;
};

export const pricesOn = (data: MarketDataSet, date: string): Record<string, number> => {
  const prices: Record<string, number> = {};
  for (const [symbol, entry] of data) {
    const price = entry.priceByDate.get(date);
    if (price !== undefined) prices[symbol] = price;
  }
  return prices;
};

export const sessionDates = (data: MarketDataSet): string[] => {
  const dates = new Set<string>();
  for (const entry of data.values()) {
    for (const bar of entry.bars) dates.add(bar.date);
  }
  return Array.from(dates).sort();
};
