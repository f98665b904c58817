import { TradingCalendar } from '../calendar/tradingCalendar';
import { BenchmarkPoint, DepositConfig } from '../core/types';
import { isDepositDay } from './deposits';

/**
 * Buy-and-hold of a single symbol with the strategy's deposit schedule: all cash goes into
 * shares on every priced day. No frictions, taxes or caps.
 */
export const simulateBenchmark = (
  priceByDate: Map<string, number>,
  tradingDays: string[],
  initialCash: number,
  calendar: TradingCalendar,
  deposits?: DepositConfig
): BenchmarkPoint[] => {
  let shares = 0;
  let cash = initialCash;
  const points: BenchmarkPoint[] = [];
  for (const date of tradingDays) {
    const price = priceByDate.get(date);
    if (price === undefined) continue;
    if (deposits && isDepositDay(date, deposits.cadence, calendar)) {
      cash += deposits.amount;
    }
    if (cash > 0 && price > 0) {
      shares += cash / price;
      cash = 0;
    }
    points.push({ date, value: shares * price + cash });
  }
  return points;
};
