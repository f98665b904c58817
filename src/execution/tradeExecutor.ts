import { BUY_CASH_UTILIZATION, LOT_QUANTITY_TOLERANCE } from '../core/constants';
import { NoPriceDataError, errorMessage } from '../core/errors';
import { FrictionsConfig, Trade, TradeIntent } from '../core/types';
import { Portfolio } from '../ledger/portfolio';

/**
 * Largest quantity whose cost, commission and slippage included, fits in the cash buffer.
 */
export const maxAffordableQuantity = (cash: number, price: number, commission: number, slippagePct: number): number => {
  const available = cash * BUY_CASH_UTILIZATION;
  return Math.max(0, (available - commission) / (price * (1 + slippagePct)));
};

/**
 * Executes intents in order against the ledger. Buys that would exhaust cash are shrunk,
 * dust is skipped, and any failure becomes a warning so the run carries on.
 */
export const executeTradeIntents = (
  portfolio: Portfolio,
  intents: TradeIntent[],
  prices: Record<string, number>,
  date: string,
  frictions: FrictionsConfig,
  warnings: string[]
): Trade[] => {
  const executed: Trade[] = [];
  const slippagePct = frictions.slippageBps / 10_000;
  const commission = frictions.commissionPerTrade;

  for (const intent of intents) {
    let quantity = intent.quantity;
    if (quantity <= LOT_QUANTITY_TOLERANCE) continue;
    try {
      const price = prices[intent.symbol];
      if (price === undefined) {
        throw new NoPriceDataError(intent.symbol, date);
      }
      if (intent.side === 'BUY') {
        const totalCost = quantity * price + commission + quantity * price * slippagePct;
        if (totalCost >= portfolio.cash * BUY_CASH_UTILIZATION) {
          quantity = maxAffordableQuantity(portfolio.cash, price, commission, slippagePct);
        }
        if (quantity > LOT_QUANTITY_TOLERANCE) {
          executed.push(portfolio.buy(intent.symbol, quantity, price, date, commission, quantity * price * slippagePct));
        }
      } else {
        const held = portfolio.getTotalQuantity(intent.symbol);
        // planner rounding can overshoot the holding by a hair
        if (quantity > held && quantity - held <= LOT_QUANTITY_TOLERANCE) quantity = held;
        executed.push(portfolio.sell(intent.symbol, quantity, price, date, commission, quantity * price * slippagePct));
      }
    } catch (err) {
      warnings.push(`Trade failed on ${date}: ${intent.side} ${quantity} ${intent.symbol} - ${errorMessage(err)}`);
    }
  }
  return executed;
};
