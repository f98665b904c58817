import { DividendEvent, HistoricalDataProvider, PriceBar, SplitEvent } from './marketData.types';
import { addDays, daysBetween, isWeekend, makeISODate, yearOf } from '../core/time';
import { hashString, mulberry32, round } from '../core/utils';

// Static price anchors so stub runs for common ETFs look plausible and repeat exactly.
const priceOverrides: Record<string, number> = {
  SPY: 475,
  QQQ: 405,
  IWM: 195,
  VTI: 235,
  EFA: 75,
  EEM: 40,
  AGG: 98,
  BND: 72,
  TLT: 95,
  SHY: 82,
  GLD: 190
};

const expenseRatios: Record<string, number> = {
  SPY: 0.000945,
  QQQ: 0.002,
  IWM: 0.0019,
  VTI: 0.0003,
  EFA: 0.0033,
  EEM: 0.007,
  AGG: 0.0003,
  BND: 0.0003,
  TLT: 0.0015,
  SHY: 0.0015,
  GLD: 0.004
};

const ANCHOR_DATE = '2000-01-03';
const DIVIDEND_MONTHS = [3, 6, 9, 12];

const basePriceForSymbol = (symbol: string): number => {
  if (priceOverrides[symbol] !== undefined) return priceOverrides[symbol];
  const rng = mulberry32(hashString(symbol));
  return 50 + rng() * 150;
};

// annual drift in [-2%, +10%)
const annualDrift = (symbol: string): number => {
  const rng = mulberry32(hashString(symbol + 'drift'));
  return rng() * 0.12 - 0.02;
};

// annual yield in [0.5%, 3.5%)
const dividendYield = (symbol: string): number => {
  const rng = mulberry32(hashString(symbol + 'yield'));
  return 0.005 + rng() * 0.03;
};

export const stubPriceForDate = (symbol: string, date: string): number => {
  const years = daysBetween(ANCHOR_DATE, date) / 365;
  const rng = mulberry32(hashString(`${symbol}-${date}`));
  const noise = (rng() - 0.5) * 0.02; // +/-1%
  return Math.max(1, round(basePriceForSymbol(symbol) * Math.pow(1 + annualDrift(symbol), years) * (1 + noise), 4));
};

/**
 * Deterministic synthetic history: weekday bars, a quarterly dividend on the first weekday
 * on or after the 15th of Mar/Jun/Sep/Dec, no splits.
 */
export class StubDataProvider implements HistoricalDataProvider {
  async getBars(symbol: string, start: string, end: string): Promise<PriceBar[]> {
    const bars: PriceBar[] = [];
    for (let d = start; d <= end; d = addDays(d, 1)) {
      if (isWeekend(d)) continue;
      const close = stubPriceForDate(symbol, d);
      const open = stubPriceForDate(symbol, addDays(d, -1));
      bars.push({
        date: d,
        open,
        high: Math.max(open, close),
        low: Math.min(open, close),
        close,
        adjClose: close,
        volume: 1_000_000 + (hashString(`${symbol}-${d}-vol`) % 500_000)
      });
    }
    return bars;
  }

  async getDividends(symbol: string, start: string, end: string): Promise<DividendEvent[]> {
    const events: DividendEvent[] = [];
    for (let year = yearOf(start); year <= yearOf(end); year++) {
      for (const month of DIVIDEND_MONTHS) {
        let exDate = makeISODate(year, month, 15);
        while (isWeekend(exDate)) exDate = addDays(exDate, 1);
        if (exDate < start || exDate > end) continue;
        const amount = round((stubPriceForDate(symbol, exDate) * dividendYield(symbol)) / 4, 4);
        events.push({ exDate, payDate: addDays(exDate, 7), amount });
      }
    }
    return events;
  }

  async getSplits(_symbol: string, _start: string, _end: string): Promise<SplitEvent[]> {
    return [];
  }

  async getExpenseRatio(symbol: string): Promise<number | undefined> {
    return expenseRatios[symbol];
  }
}

export const defaultMarketData = new StubDataProvider();
