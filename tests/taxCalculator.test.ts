import { Portfolio } from '../src/ledger/portfolio';
import { TaxCalculator } from '../src/tax/taxCalculator';
import { taxConfig } from './fixtures';

const calculator = new TaxCalculator(taxConfig);

describe('TaxCalculator.calculateAnnualTax', () => {
  it('taxes a long-term gain at the capital gains rate plus state', () => {
    const p = new Portfolio({ initialCash: 10_000, accountType: 'TAXABLE' });
    p.buy('SPY', 10, 400, '2024-01-01');
    p.sell('SPY', 10, 500, '2025-01-02');
    const summary = calculator.calculateAnnualTax(2025, p);
    expect(summary.longTermGains).toBeCloseTo(1000, 9);
    expect(summary.totalTax).toBeCloseTo(210, 9);
  });

  it('taxes a short-term gain at the ordinary rate plus state', () => {
    const p = new Portfolio({ initialCash: 10_000, accountType: 'TAXABLE' });
    p.buy('SPY', 10, 400, '2024-01-01');
    p.sell('SPY', 10, 500, '2024-06-01');
    const summary = calculator.calculateAnnualTax(2024, p);
    expect(summary.shortTermGains).toBeCloseTo(1000, 9);
    expect(summary.totalTax).toBeCloseTo(380, 9);
  });

  it('gives no credit for net losses', () => {
    const p = new Portfolio({ initialCash: 100_000, accountType: 'TAXABLE', applyWashSale: false });
    p.buy('AAA', 10, 100, '2023-01-03');
    p.buy('BBB', 10, 100, '2024-01-02');
    p.sell('AAA', 10, 200, '2024-02-01');
    p.sell('BBB', 10, 50, '2024-02-01');
    const summary = calculator.calculateAnnualTax(2024, p);
    expect(summary.longTermGains).toBeCloseTo(1000, 9);
    expect(summary.shortTermGains).toBeCloseTo(-500, 9);
    expect(summary.totalTax).toBeCloseTo(210, 9);
  });

  it('taxes qualified dividends like long-term gains and interest like ordinary income', () => {
    const p = new Portfolio({ initialCash: 10_000, accountType: 'TAXABLE' });
    p.buy('SPY', 10, 100, '2024-01-02');
    p.recordDividend('SPY', 100, '2024-03-15', 1);
    p.recordInterest(50, '2024-06-30');
    expect(calculator.calculateAnnualTax(2024, p).totalTax).toBeCloseTo(40, 9);
  });

  it('returns the same summary when asked twice', () => {
    const p = new Portfolio({ initialCash: 10_000, accountType: 'TAXABLE' });
    p.buy('SPY', 10, 400, '2024-01-01');
    p.sell('SPY', 10, 500, '2024-06-01');
    expect(calculator.calculateAnnualTax(2024, p)).toEqual(calculator.calculateAnnualTax(2024, p));
  });

  it('counts the wash sales of the year', () => {
    const p = new Portfolio({ initialCash: 10_000, accountType: 'TAXABLE' });
    p.buy('SPY', 10, 100, '2024-03-01');
    p.sell('SPY', 5, 90, '2024-03-15');
    expect(calculator.calculateAnnualTax(2024, p).washSaleCount).toBe(1);
    expect(calculator.calculateAnnualTax(2025, p).washSaleCount).toBe(0);
  });

  it('is zero for tax-advantaged accounts', () => {
    for (const accountType of ['TRADITIONAL_IRA', 'ROTH_IRA', 'PLAN_529'] as const) {
      const p = new Portfolio({ initialCash: 10_000, accountType });
      p.buy('SPY', 10, 400, '2024-01-01');
      p.sell('SPY', 10, 500, '2024-06-01');
      expect(calculator.calculateAnnualTax(2024, p).totalTax).toBe(0);
    }
  });
});

describe('TaxCalculator.applyYearEndTax', () => {
  it('takes the bill out of cash and records it for the year', () => {
    const p = new Portfolio({ initialCash: 10_000, accountType: 'TAXABLE' });
    p.buy('SPY', 10, 400, '2024-01-01');
    p.sell('SPY', 10, 500, '2024-06-01');
    const tax = calculator.applyYearEndTax(2024, p);
    expect(tax).toBeCloseTo(380, 9);
    expect(p.cash).toBeCloseTo(10_620, 9);
    expect(p.getYear(2024).taxesPaid).toBeCloseTo(380, 9);
  });

  it('leaves cash alone when taxes are paid from outside', () => {
    const p = new Portfolio({ initialCash: 10_000, accountType: 'TAXABLE' });
    p.buy('SPY', 10, 400, '2024-01-01');
    p.sell('SPY', 10, 500, '2024-06-01');
    expect(calculator.applyYearEndTax(2024, p, true)).toBeCloseTo(380, 9);
    expect(p.cash).toBe(11_000);
  });

  it('does not touch a Roth account', () => {
    const p = new Portfolio({ initialCash: 100_000, accountType: 'ROTH_IRA' });
    p.buy('SPY', 100, 400, '2024-01-02');
    expect(p.cash).toBe(60_000);
    expect(calculator.applyYearEndTax(2024, p)).toBe(0);
    expect(p.cash).toBe(60_000);
  });
});

describe('TaxCalculator.calculateAfterTaxValue', () => {
  it('leaves Roth and 529 balances untouched', () => {
    for (const accountType of ['ROTH_IRA', 'PLAN_529'] as const) {
      const p = new Portfolio({ initialCash: 10_000, accountType });
      p.buy('SPY', 10, 400, '2024-01-02');
      expect(calculator.calculateAfterTaxValue(p, { SPY: 500 })).toBe(11_000);
    }
  });

  it('applies the withdrawal rate to the whole traditional IRA balance', () => {
    const p = new Portfolio({ initialCash: 10_000, accountType: 'TRADITIONAL_IRA' });
    expect(calculator.calculateAfterTaxValue(p, {})).toBe(7500);
    expect(calculator.calculateAfterTaxValue(p, {}, 0.1)).toBe(9000);
  });

  it('deducts long-term tax on unrealized gains only in a taxable account', () => {
    const p = new Portfolio({ initialCash: 10_000, accountType: 'TAXABLE' });
    p.buy('SPY', 10, 400, '2024-01-02');
    p.buy('AGG', 10, 100, '2024-01-02');
    // SPY +1000 unrealized, AGG -200 not credited
    expect(calculator.calculateAfterTaxValue(p, { SPY: 500, AGG: 80 })).toBeCloseTo(5000 + 5000 + 800 - 210, 9);
  });
});

describe('TaxCalculator.calculateTaxDrag', () => {
  it('reports tax paid as a share of the year-end value', () => {
    const p = new Portfolio({ initialCash: 10_000, accountType: 'TAXABLE' });
    p.deductTax(200, 2024);
    const drag = calculator.calculateTaxDrag(p, [
      { date: '2024-12-30', portfolioValue: 9900, cash: 9900, positionsValue: 0 },
      { date: '2024-12-31', portfolioValue: 10_000, cash: 10_000, positionsValue: 0 },
      { date: '2025-01-02', portfolioValue: 9800, cash: 9800, positionsValue: 0 }
    ]);
    expect(drag).toEqual([
      { year: 2024, taxPaid: 200, yearEndValue: 10_000, dragPct: 0.02 },
      { year: 2025, taxPaid: 0, yearEndValue: 9800, dragPct: 0 }
    ]);
  });
});
