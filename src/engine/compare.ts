import { BacktestSummary, summarizeResult } from '../analytics/summary';
import { AccountType, StrategyConfig } from '../core/types';
import { HistoricalDataProvider } from '../data/marketData.types';
import { runBacktest, RunOptions } from './runner';

export const ALL_ACCOUNT_TYPES: AccountType[] = ['TAXABLE', 'TRADITIONAL_IRA', 'ROTH_IRA', 'PLAN_529'];

/**
 * Runs the same strategy once per account kind. Runs share nothing but the provider,
 * so they go concurrently.
 */
export const compareAccountTypes = async (
  config: StrategyConfig,
  provider: HistoricalDataProvider,
  kinds: AccountType[] = ALL_ACCOUNT_TYPES,
  options: RunOptions = {}
): Promise<Partial<Record<AccountType, BacktestSummary>>> => {
  const results = await Promise.all(
    kinds.map(async (type) => {
      const result = await runBacktest({ ...config, account: { ...config.account, type } }, provider, options);
      return [type, summarizeResult(result)] as const;
    })
  );
  const byKind: Partial<Record<AccountType, BacktestSummary>> = {};
  for (const [type, summary] of results) byKind[type] = summary;
  return byKind;
};
