import { AccountType, BacktestResult } from '../core/types';
import { round } from '../core/utils';

export interface BacktestSummary {
  name: string;
  accountType: AccountType;
  start: string;
  end: string;
  initialCash: number;
  finalValue: number;
  totalDeposits: number;
  totalTaxesPaid: number;
  netGain: number;
  afterTaxValue: number;
  tradeCount: number;
  washSaleCount: number;
  warningCount: number;
}

// Net gain is measured against everything put in: initial cash plus deposits.
export const summarizeResult = (result: BacktestResult): BacktestSummary => {
  const { config, equityCurve, diagnostics } = result;
  const last = equityCurve[equityCurve.length - 1];
  const finalValue = last ? last.portfolioValue : config.initialCash;
  return {
    name: config.meta.name,
    accountType: config.account.type,
    start: equityCurve[0]?.date ?? config.period.start,
    end: last?.date ?? config.period.end,
    initialCash: config.initialCash,
    finalValue: round(finalValue),
    totalDeposits: round(diagnostics.totalDeposits),
    totalTaxesPaid: round(diagnostics.totalTaxesPaid),
    netGain: round(finalValue - config.initialCash - diagnostics.totalDeposits),
    afterTaxValue: round(result.afterTaxValue),
    tradeCount: diagnostics.totalTrades,
    washSaleCount: result.taxSummaries.reduce((acc, s) => acc + s.washSaleCount, 0),
    warningCount: result.warnings.length
  };
};

export const formatSummary = (summary: BacktestSummary): string =>
  [
    `${summary.name} [${summary.accountType}] ${summary.start} -> ${summary.end}`,
    `  final value:     $${summary.finalValue.toFixed(2)}`,
    `  deposits:        $${summary.totalDeposits.toFixed(2)}`,
    `  taxes paid:      $${summary.totalTaxesPaid.toFixed(2)}`,
    `  net gain:        $${summary.netGain.toFixed(2)}`,
    `  after-tax value: $${summary.afterTaxValue.toFixed(2)}`,
    `  trades: ${summary.tradeCount}, wash sales: ${summary.washSaleCount}, warnings: ${summary.warningCount}`
  ].join('\n');
