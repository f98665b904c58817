// IRS limits; update annually.
export const IRA_CONTRIBUTION_LIMIT = 7000;
export const IRA_CATCHUP_LIMIT = 1000;
export const ROTH_CONTRIBUTION_LIMIT = 7000;
export const ROTH_CATCHUP_LIMIT = 1000;

export const SHORT_TERM_DAYS = 365; // <= 365 days held is short-term
export const WASH_SALE_DAYS = 30;

export const DEFAULT_SLIPPAGE_BPS = 5;
export const DEFAULT_COMMISSION = 0;
export const TRADING_DAYS_PER_YEAR = 252;

// Lots at or below this many shares are treated as depleted.
export const LOT_QUANTITY_TOLERANCE = 1e-4;
// Buys that would consume this share of cash or more are shrunk to fit.
export const BUY_CASH_UTILIZATION = 0.9999;
// Tax-deferred rebalance buys are sized slightly under the gap to leave room for slippage.
export const DEFERRED_BUY_SIZING = 0.999;
export const MIN_REBALANCE_TRADE_USD = 1;
