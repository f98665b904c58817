import { LOT_QUANTITY_TOLERANCE, SHORT_TERM_DAYS, WASH_SALE_DAYS } from '../core/constants';
import { InsufficientCashError, InsufficientSharesError } from '../core/errors';
import { addDays, daysBetween, yearOf } from '../core/time';
import {
  AccountType,
  Lot,
  LotMethod,
  Position,
  Trade,
  WashSaleRecord,
  YearAccumulator
} from '../core/types';
import { safeUuid, sum } from '../core/utils';
import { selectLotsForSale } from './lotSelection';

export interface PortfolioOptions {
  initialCash: number;
  accountType: AccountType;
  lotMethod?: LotMethod;
  applyWashSale?: boolean;
  idFactory?: () => string;
}

const emptyYear = (): YearAccumulator => ({
  contributions: 0,
  realizedShortTerm: 0,
  realizedLongTerm: 0,
  qualifiedDividends: 0,
  ordinaryDividends: 0,
  interestIncome: 0,
  taxesPaid: 0
});

/**
 * Tax-lot ledger for one simulated account. Owns cash, lots, the trade log and the
 * per-year tax accumulators; every mutation goes through the methods below.
 */
export class Portfolio {
  readonly initialCash: number;
  readonly accountType: AccountType;
  readonly lotMethod: LotMethod;
  readonly applyWashSale: boolean;

  private cashBalance: number;
  private lotsBySymbol = new Map<string, Lot[]>();
  private trades: Trade[] = [];
  private washSales: WashSaleRecord[] = [];
  private yearly = new Map<number, YearAccumulator>();
  private realizedShortTerm = 0;
  private realizedLongTerm = 0;
  private nextId: () => string;

  constructor({ initialCash, accountType, lotMethod = 'HIFO', applyWashSale = true, idFactory }: PortfolioOptions) {
    this.initialCash = initialCash;
    this.cashBalance = initialCash;
    this.accountType = accountType;
    this.lotMethod = lotMethod;
    this.applyWashSale = applyWashSale;
    this.nextId = idFactory ?? safeUuid;
  }

  get cash(): number {
    return this.cashBalance;
  }

  buy(
    symbol: string,
    quantity: number,
    price: number,
    date: string,
    commission = 0,
    slippage = 0,
    action: 'BUY' | 'DRIP' = 'BUY'
  ): Trade {
    const totalCost = quantity * price + commission + slippage;
    if (this.cashBalance < totalCost) {
      throw new InsufficientCashError(totalCost, this.cashBalance);
    }
    this.cashBalance -= totalCost;

    const lot: Lot = {
      lotId: this.nextId(),
      symbol,
      quantity,
      costBasis: totalCost,
      acquisitionDate: date,
      isWashSale: false,
      washSaleDisallowed: 0
    };
    const lots = this.lotsBySymbol.get(symbol) ?? [];
    lots.push(lot);
    this.lotsBySymbol.set(symbol, lots);

    return this.appendTrade({
      tradeId: this.nextId(),
      date,
      symbol,
      action,
      quantity,
      price,
      commission,
      slippage,
      cashImpact: -totalCost,
      lotIds: [lot.lotId]
    });
  }

  sell(symbol: string, quantity: number, price: number, date: string, commission = 0, slippage = 0): Trade {
    const held = this.getTotalQuantity(symbol);
    if (held < quantity) {
      throw new InsufficientSharesError(symbol, quantity, held);
    }
    const lots = this.lotsBySymbol.get(symbol) ?? [];
    const slices = selectLotsForSale(lots, quantity, this.lotMethod, this.accountType);

    const netProceeds = quantity * price - commission - slippage;
    this.cashBalance += netProceeds;

    const lotIds: string[] = [];
    for (const { lot, quantity: fromLot } of slices) {
      lotIds.push(lot.lotId);
      const costPortion = (lot.costBasis / lot.quantity) * fromLot;
      const proceedsPortion = (fromLot / quantity) * netProceeds;
      let gain = proceedsPortion - costPortion;
      const shortTerm = daysBetween(lot.acquisitionDate, date) <= SHORT_TERM_DAYS;

      if (this.accountType === 'TAXABLE') {
        if (this.applyWashSale && gain < 0 && this.hasWashSalePurchase(symbol, date)) {
          const disallowed = Math.abs(gain);
          lot.isWashSale = true;
          lot.washSaleDisallowed += disallowed;
          this.washSales.push({ symbol, date, lotId: lot.lotId, disallowedLoss: disallowed });
          gain = 0;
        }
        const year = this.yearFor(yearOf(date));
        if (shortTerm) {
          this.realizedShortTerm += gain;
          year.realizedShortTerm += gain;
        } else {
          this.realizedLongTerm += gain;
          year.realizedLongTerm += gain;
        }
      }

      lot.quantity -= fromLot;
      lot.costBasis -= costPortion;
      if (lot.quantity <= LOT_QUANTITY_TOLERANCE) {
        lots.splice(lots.indexOf(lot), 1);
      }
    }
    if (!lots.length) this.lotsBySymbol.delete(symbol);

    return this.appendTrade({
      tradeId: this.nextId(),
      date,
      symbol,
      action: 'SELL',
      quantity,
      price,
      commission,
      slippage,
      cashImpact: netProceeds,
      lotIds
    });
  }

  recordDividend(
    symbol: string,
    amount: number,
    exDate: string,
    qualifiedPct = 1,
    sharesHeld = this.getTotalQuantity(symbol)
  ): Trade {
    this.cashBalance += amount;
    if (this.accountType === 'TAXABLE') {
      const year = this.yearFor(yearOf(exDate));
      year.qualifiedDividends += amount * qualifiedPct;
      year.ordinaryDividends += amount * (1 - qualifiedPct);
    }
    const perShare = sharesHeld > 0 ? amount / sharesHeld : amount;
    return this.appendTrade({
      tradeId: `DIV-${exDate}-${symbol}`,
      date: exDate,
      symbol,
      action: 'DIVIDEND',
      quantity: sharesHeld,
      price: perShare,
      commission: 0,
      slippage: 0,
      cashImpact: amount,
      lotIds: [],
      notes: `Dividend: $${perShare.toFixed(4)}/share x ${sharesHeld.toFixed(2)} shares`
    });
  }

  recordInterest(amount: number, date: string) {
    this.cashBalance += amount;
    if (this.accountType === 'TAXABLE') {
      this.yearFor(yearOf(date)).interestIncome += amount;
    }
  }

  addDeposit(amount: number, date: string) {
    this.cashBalance += amount;
    this.yearFor(yearOf(date)).contributions += amount;
  }

  // Cash may go negative here; callers decide whether that is acceptable.
  deductTax(amount: number, year?: number) {
    this.cashBalance -= amount;
    if (year !== undefined) {
      this.yearFor(year).taxesPaid += amount;
    }
  }

  /** Erodes the basis of every lot of `symbol` by `dailyRate` (expense-ratio drag). */
  applyCostBasisDrag(symbol: string, dailyRate: number) {
    for (const lot of this.lotsBySymbol.get(symbol) ?? []) {
      lot.costBasis -= lot.costBasis * dailyRate;
    }
  }

  getTotalQuantity(symbol: string): number {
    return sum((this.lotsBySymbol.get(symbol) ?? []).map((l) => l.quantity));
  }

  getLots(symbol: string): Lot[] {
    return (this.lotsBySymbol.get(symbol) ?? []).map((l) => ({ ...l }));
  }

  getAllLots(): Lot[] {
    return Array.from(this.lotsBySymbol.keys()).flatMap((symbol) => this.getLots(symbol));
  }

  getSymbols(): string[] {
    return Array.from(this.lotsBySymbol.keys());
  }

  getPosition(symbol: string, price = 0): Position | undefined {
    const lots = this.lotsBySymbol.get(symbol);
    if (!lots?.length) return undefined;
    const quantity = sum(lots.map((l) => l.quantity));
    const costBasis = sum(lots.map((l) => l.costBasis));
    const marketValue = quantity * price;
    return {
      symbol,
      quantity,
      marketValue,
      costBasis,
      unrealizedGain: marketValue - costBasis,
      lots: lots.map((l) => ({ ...l }))
    };
  }

  getAllPositions(prices: Record<string, number>): Position[] {
    return this.getSymbols()
      .map((symbol) => this.getPosition(symbol, prices[symbol] ?? 0))
      .filter((p): p is Position => p !== undefined);
  }

  getPositionsValue(prices: Record<string, number>): number {
    let value = 0;
    for (const symbol of this.getSymbols()) {
      const price = prices[symbol];
      if (price !== undefined) value += this.getTotalQuantity(symbol) * price;
    }
    return value;
  }

  getTotalValue(prices: Record<string, number>): number {
    return this.cashBalance + this.getPositionsValue(prices);
  }

  getCurrentWeights(prices: Record<string, number>): Record<string, number> {
    const total = this.getTotalValue(prices);
    if (total <= 0) return {};
    const weights: Record<string, number> = {};
    for (const pos of this.getAllPositions(prices)) {
      weights[pos.symbol] = pos.marketValue / total;
    }
    return weights;
  }

  getTrades(): Trade[] {
    return this.trades.slice();
  }

  getWashSales(): WashSaleRecord[] {
    return this.washSales.map((w) => ({ ...w }));
  }

  getYear(year: number): YearAccumulator {
    return { ...(this.yearly.get(year) ?? emptyYear()) };
  }

  getYears(): number[] {
    return Array.from(this.yearly.keys()).sort((a, b) => a - b);
  }

  getRealizedGains(): { shortTerm: number; longTerm: number } {
    return { shortTerm: this.realizedShortTerm, longTerm: this.realizedLongTerm };
  }

  getTotalDeposits(): number {
    return sum(Array.from(this.yearly.values()).map((y) => y.contributions));
  }

  getTotalTaxesPaid(): number {
    return sum(Array.from(this.yearly.values()).map((y) => y.taxesPaid));
  }

  private appendTrade(trade: Trade): Trade {
    const frozen = Object.freeze({ ...trade, lotIds: Object.freeze([...trade.lotIds]) });
    this.trades.push(frozen);
    return frozen;
  }

  private yearFor(year: number): YearAccumulator {
    let acc = this.yearly.get(year);
    if (!acc) {
      acc = emptyYear();
      this.yearly.set(year, acc);
    }
    return acc;
  }

  // Scans lots held right now, the one being sold included; later purchases are not revisited.
  private hasWashSalePurchase(symbol: string, saleDate: string): boolean {
    const windowStart = addDays(saleDate, -WASH_SALE_DAYS);
    const windowEnd = addDays(saleDate, WASH_SALE_DAYS);
    return (this.lotsBySymbol.get(symbol) ?? []).some(
      (lot) => lot.acquisitionDate >= windowStart && lot.acquisitionDate <= windowEnd && lot.acquisitionDate !== saleDate
    );
  }
}
