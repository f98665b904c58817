import { TradingCalendar } from '../calendar/tradingCalendar';
import { ContributionCapExceededError } from '../core/errors';
import { monthOf, quarterOf, weekdayOf, yearOf } from '../core/time';
import { AccountConfig, DepositCadence } from '../core/types';
import { Portfolio } from '../ledger/portfolio';

// Only ever asked about trading days, so "daily" and "every market day" coincide.
export const isDepositDay = (date: string, cadence: DepositCadence, calendar: TradingCalendar): boolean => {
  const year = yearOf(date);
  switch (cadence) {
    case 'none':
      return false;
    case 'daily':
    case 'every_market_day':
      return true;
    case 'weekly':
      return weekdayOf(date) === 1;
    case 'monthly':
      return date === calendar.firstTradingDayOfMonth(year, monthOf(date));
    case 'quarterly':
      return date === calendar.firstTradingDayOfQuarter(year, quarterOf(date));
    case 'yearly':
      return date === calendar.firstTradingDayOfYear(year);
  }
};

/** Annual contribution limit for the account, or undefined when uncapped. */
export const contributionCap = (account: AccountConfig): number | undefined => {
  const caps = account.contributionCaps;
  if (!caps.enforce) return undefined;
  switch (account.type) {
    case 'TRADITIONAL_IRA':
      return caps.ira + (caps.catchUpEligible ? caps.iraCatchUp : 0);
    case 'ROTH_IRA':
      return caps.roth + (caps.catchUpEligible ? caps.rothCatchUp : 0);
    case 'TAXABLE':
    case 'PLAN_529':
      return undefined;
  }
};

export const enforceContributionCap = (portfolio: Portfolio, account: AccountConfig, date: string, amount: number) => {
  const cap = contributionCap(account);
  if (cap === undefined) return;
  const year = yearOf(date);
  const attempted = portfolio.getYear(year).contributions + amount;
  if (attempted > cap) {
    throw new ContributionCapExceededError(year, cap, attempted);
  }
};
