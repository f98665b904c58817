import { StubDataProvider } from '../src/data/marketData.stub';
import { compareAccountTypes } from '../src/engine/compare';
import { makeConfig, quietLogger } from './fixtures';

describe('compareAccountTypes', () => {
  const config = makeConfig({
    period: { start: '2024-01-02', end: '2024-03-29', calendar: 'WEEKDAYS' },
    initialCash: 20_000,
    deposits: { cadence: 'monthly', amount: 500 },
    dividends: { mode: 'DRIP' }
  });

  it('runs one backtest per account kind', async () => {
    const summaries = await compareAccountTypes(
      config,
      new StubDataProvider(),
      ['TAXABLE', 'TRADITIONAL_IRA', 'ROTH_IRA'],
      { logger: quietLogger() }
    );
    expect(Object.keys(summaries).sort()).toEqual(['ROTH_IRA', 'TAXABLE', 'TRADITIONAL_IRA']);

    const taxable = summaries.TAXABLE;
    const traditional = summaries.TRADITIONAL_IRA;
    const roth = summaries.ROTH_IRA;
    if (!taxable || !traditional || !roth) throw new Error('missing summary');

    // the March dividend is taxed only in the taxable account
    expect(taxable.totalTaxesPaid).toBeGreaterThan(0);
    expect(roth.totalTaxesPaid).toBe(0);
    expect(roth.afterTaxValue).toBe(roth.finalValue);
    expect(traditional.afterTaxValue).toBeCloseTo(traditional.finalValue * 0.75, 1);
    // Feb and Mar deposits; Jan 1 is the first weekday of January
    expect(roth.totalDeposits).toBe(1000);
  });
});
