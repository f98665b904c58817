import { yearOf } from '../core/time';
import { EquityPoint, TaxConfig, TaxDragEntry, TaxSummary } from '../core/types';
import { Portfolio } from '../ledger/portfolio';

export class TaxCalculator {
  constructor(private readonly config: TaxConfig) {}

  private get ordinaryRate() {
    return this.config.federalOrdinary + this.config.state;
  }

  private get longTermRate() {
    return this.config.federalLtcg + this.config.state;
  }

  /** Pure read of the ledger's accumulators for `year`; calling it twice gives the same answer. */
  calculateAnnualTax(year: number, portfolio: Portfolio): TaxSummary {
    const acc = portfolio.getYear(year);
    const washSaleCount = portfolio.getWashSales().filter((w) => yearOf(w.date) === year).length;
    const summary: TaxSummary = {
      year,
      shortTermGains: acc.realizedShortTerm,
      longTermGains: acc.realizedLongTerm,
      qualifiedDividends: acc.qualifiedDividends,
      ordinaryDividends: acc.ordinaryDividends,
      interestIncome: acc.interestIncome,
      totalTax: 0,
      washSaleCount
    };

    switch (portfolio.accountType) {
      case 'TAXABLE': {
        // net losses contribute nothing; there is no carry-forward
        const shortTermTax = Math.max(0, acc.realizedShortTerm) * this.ordinaryRate;
        const longTermTax = Math.max(0, acc.realizedLongTerm) * this.longTermRate;
        const qualifiedTax = acc.qualifiedDividends * this.longTermRate;
        const ordinaryTax = (acc.ordinaryDividends + acc.interestIncome) * this.ordinaryRate;
        summary.totalTax = shortTermTax + longTermTax + qualifiedTax + ordinaryTax;
        return summary;
      }
      case 'TRADITIONAL_IRA':
      case 'ROTH_IRA':
      case 'PLAN_529':
        return summary;
    }
  }

  /** Computes the year's bill and, unless it is paid from outside, takes it out of cash. */
  applyYearEndTax(year: number, portfolio: Portfolio, payFromExternal = this.config.payTaxesFromExternal): number {
    const { totalTax } = this.calculateAnnualTax(year, portfolio);
    if (!payFromExternal && totalTax > 0) {
      portfolio.deductTax(totalTax, year);
    }
    return totalTax;
  }

  calculateAfterTaxValue(
    portfolio: Portfolio,
    prices: Record<string, number>,
    withdrawalTaxRate = this.config.withdrawalTaxRateForIra
  ): number {
    const totalValue = portfolio.getTotalValue(prices);
    switch (portfolio.accountType) {
      case 'ROTH_IRA':
      case 'PLAN_529':
        return totalValue;
      case 'TRADITIONAL_IRA':
        return totalValue * (1 - withdrawalTaxRate);
      case 'TAXABLE': {
        // unrealized gains taxed as long-term; unrealized losses are not credited
        const unrealizedTax = portfolio
          .getAllPositions(prices)
          .filter((p) => p.unrealizedGain > 0)
          .reduce((acc, p) => acc + p.unrealizedGain * this.longTermRate, 0);
        return totalValue - unrealizedTax;
      }
    }
  }

  /** Tax paid each year as a share of that year's closing value. */
  calculateTaxDrag(portfolio: Portfolio, equityCurve: EquityPoint[]): TaxDragEntry[] {
    const yearEndValue = new Map<number, number>();
    for (const point of equityCurve) {
      yearEndValue.set(yearOf(point.date), point.portfolioValue);
    }
    return Array.from(yearEndValue.entries()).map(([year, value]) => {
      const taxPaid = portfolio.getYear(year).taxesPaid;
      return { year, taxPaid, yearEndValue: value, dragPct: value > 0 ? taxPaid / value : 0 };
    });
  }
}
