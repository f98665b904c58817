import { TradingCalendar } from '../calendar/tradingCalendar';
import { DEFERRED_BUY_SIZING, MIN_REBALANCE_TRADE_USD } from '../core/constants';
import { addDays, monthOf, quarterOf, yearOf } from '../core/time';
import { AccountType, CalendarPeriod, RebalancingConfig, TradeIntent } from '../core/types';
import { Portfolio } from '../ledger/portfolio';

export type RebalanceReason = 'calendar' | 'drift' | 'deposit';

export interface RebalanceDecision {
  shouldRebalance: boolean;
  reason?: RebalanceReason;
}

const NO_REBALANCE: RebalanceDecision = { shouldRebalance: false };

/**
 * Decides when to rebalance and plans the trades. The calendar channel keeps one piece of
 * state, the next boundary date, which only ever moves forward.
 */
export class Rebalancer {
  private nextCalendarDate?: string;

  constructor(
    private readonly config: RebalancingConfig,
    private readonly calendar: TradingCalendar,
    private readonly accountType: AccountType
  ) {}

  get nextCalendarRebalance(): string | undefined {
    return this.nextCalendarDate;
  }

  shouldRebalance(
    currentDate: string,
    currentWeights: Record<string, number>,
    targetWeights: Record<string, number>,
    isDepositDay = false
  ): RebalanceDecision {
    const { type } = this.config;
    if (type === 'CASHFLOW_ONLY') {
      return isDepositDay ? { shouldRebalance: true, reason: 'deposit' } : NO_REBALANCE;
    }

    const calendarTrigger = (type === 'CALENDAR' || type === 'BOTH') && this.checkCalendarTrigger(currentDate);
    const driftTrigger = (type === 'DRIFT' || type === 'BOTH') && this.checkDriftTrigger(currentWeights, targetWeights);

    if (calendarTrigger) return { shouldRebalance: true, reason: 'calendar' };
    if (driftTrigger) return { shouldRebalance: true, reason: 'drift' };
    if (isDepositDay) return { shouldRebalance: true, reason: 'deposit' };
    return NO_REBALANCE;
  }

  /** Invests a deposit at target weights without touching existing positions. */
  generateDepositTrades(
    targetWeights: Record<string, number>,
    depositAmount: number,
    prices: Record<string, number>
  ): TradeIntent[] {
    if (depositAmount <= 0) return [];
    const intents: TradeIntent[] = [];
    for (const [symbol, weight] of Object.entries(targetWeights)) {
      const price = prices[symbol];
      if (weight <= 0 || price === undefined || price <= 0) continue;
      intents.push({ symbol, side: 'BUY', quantity: (depositAmount * weight) / price });
    }
    return intents;
  }

  /**
   * Trades that bring the portfolio back to target weights. Taxable accounts sell losers
   * first (largest loss first), then buy, then trim winners; other accounts trade directly.
   */
  generateRebalanceTrades(
    portfolio: Portfolio,
    targetWeights: Record<string, number>,
    prices: Record<string, number>
  ): TradeIntent[] {
    const totalValue = portfolio.getTotalValue(prices);
    if (totalValue <= 0) return [];

    const currentWeights = portfolio.getCurrentWeights(prices);
    const targetValues: Record<string, number> = {};
    const currentValues: Record<string, number> = {};
    for (const [symbol, weight] of Object.entries(targetWeights)) {
      const price = prices[symbol];
      if (price === undefined || price <= 0) continue;
      targetValues[symbol] = weight * totalValue;
      currentValues[symbol] = (currentWeights[symbol] ?? 0) * totalValue;
    }

    if (this.accountType === 'TAXABLE') {
      return this.taxAwareTrades(portfolio, currentValues, targetValues, prices);
    }
    return this.directTrades(currentValues, targetValues, prices);
  }

  private taxAwareTrades(
    portfolio: Portfolio,
    currentValues: Record<string, number>,
    targetValues: Record<string, number>,
    prices: Record<string, number>
  ): TradeIntent[] {
    const losers: Array<{ symbol: string; unrealized: number }> = [];
    const winners: Array<{ symbol: string; unrealized: number }> = [];
    for (const pos of portfolio.getAllPositions(prices)) {
      const target = targetValues[pos.symbol];
      if (target === undefined || currentValues[pos.symbol] <= target) continue;
      (pos.unrealizedGain < 0 ? losers : winners).push({ symbol: pos.symbol, unrealized: pos.unrealizedGain });
    }
    losers.sort((a, b) => a.unrealized - b.unrealized);

    const sellDown = (symbol: string): TradeIntent => ({
      symbol,
      side: 'SELL',
      quantity: (currentValues[symbol] - targetValues[symbol]) / prices[symbol]
    });

    const intents: TradeIntent[] = losers.map((l) => sellDown(l.symbol));
    for (const [symbol, target] of Object.entries(targetValues)) {
      const current = currentValues[symbol];
      if (current < target) {
        intents.push({ symbol, side: 'BUY', quantity: (target - current) / prices[symbol] });
      }
    }
    intents.push(...winners.map((w) => sellDown(w.symbol)));
    return intents;
  }

  private directTrades(
    currentValues: Record<string, number>,
    targetValues: Record<string, number>,
    prices: Record<string, number>
  ): TradeIntent[] {
    const sells: TradeIntent[] = [];
    const buys: TradeIntent[] = [];
    for (const [symbol, target] of Object.entries(targetValues)) {
      const diff = target - currentValues[symbol];
      if (Math.abs(diff) < MIN_REBALANCE_TRADE_USD) continue;
      if (diff > 0) {
        buys.push({ symbol, side: 'BUY', quantity: (diff * DEFERRED_BUY_SIZING) / prices[symbol] });
      } else {
        sells.push({ symbol, side: 'SELL', quantity: Math.abs(diff) / prices[symbol] });
      }
    }
    // sells first so the freed cash is there for the buys
    return [...sells, ...buys];
  }

  private checkCalendarTrigger(currentDate: string): boolean {
    const period = this.config.calendar?.period;
    if (!period) return false;
    if (this.nextCalendarDate === undefined) {
      this.nextCalendarDate = this.nextCalendarBoundary(currentDate, period);
      return false;
    }
    if (currentDate >= this.nextCalendarDate) {
      this.nextCalendarDate = this.nextCalendarBoundary(currentDate, period);
      return true;
    }
    return false;
  }

  private nextCalendarBoundary(currentDate: string, period: CalendarPeriod): string {
    const year = yearOf(currentDate);
    switch (period) {
      case 'W':
        return this.calendar.alignToBusinessDay(addDays(currentDate, 7), 'FIRST_BUSINESS_DAY');
      case 'M': {
        const month = monthOf(currentDate);
        return month === 12
          ? this.calendar.firstTradingDayOfMonth(year + 1, 1)
          : this.calendar.firstTradingDayOfMonth(year, month + 1);
      }
      case 'Q': {
        const quarter = quarterOf(currentDate);
        return quarter === 4
          ? this.calendar.firstTradingDayOfQuarter(year + 1, 1)
          : this.calendar.firstTradingDayOfQuarter(year, quarter + 1);
      }
      case 'Y':
        return this.calendar.firstTradingDayOfYear(year + 1);
      case 'D':
      default:
        return this.calendar.nextTradingDay(currentDate);
    }
  }

  private checkDriftTrigger(currentWeights: Record<string, number>, targetWeights: Record<string, number>): boolean {
    const drift = this.config.drift;
    if (!drift) return false;
    const { absPct, relPct } = drift;
    return Object.entries(targetWeights).some(([symbol, target]) => {
      const gap = Math.abs((currentWeights[symbol] ?? 0) - target);
      if (absPct !== undefined && gap > absPct) return true;
      return relPct !== undefined && target > 0 && gap / target > relPct;
    });
  }
}
