export type BacktestErrorCode =
  | 'INSUFFICIENT_CASH'
  | 'INSUFFICIENT_SHARES'
  | 'NO_PRICE_DATA'
  | 'CONTRIBUTION_CAP_EXCEEDED'
  | 'INVALID_CONFIG';

export class BacktestError extends Error {
  readonly code: BacktestErrorCode;

  constructor(code: BacktestErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InsufficientCashError extends BacktestError {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super('INSUFFICIENT_CASH', `Insufficient cash: need $${required.toFixed(2)}, have $${available.toFixed(2)}`);
    this.required = required;
    this.available = available;
  }
}

export class InsufficientSharesError extends BacktestError {
  readonly symbol: string;
  readonly requested: number;
  readonly held: number;

  constructor(symbol: string, requested: number, held: number) {
    super('INSUFFICIENT_SHARES', `Insufficient shares of ${symbol}: need ${requested}, have ${held}`);
    this.symbol = symbol;
    this.requested = requested;
    this.held = held;
  }
}

export class NoPriceDataError extends BacktestError {
  readonly symbol: string;
  readonly date: string;

  constructor(symbol: string, date: string) {
    super('NO_PRICE_DATA', `No price data for ${symbol} on ${date}`);
    this.symbol = symbol;
    this.date = date;
  }
}

export class ContributionCapExceededError extends BacktestError {
  readonly cap: number;
  readonly attempted: number;

  constructor(year: number, cap: number, attempted: number) {
    super(
      'CONTRIBUTION_CAP_EXCEEDED',
      `Contribution of $${attempted.toFixed(2)} would exceed the ${year} cap of $${cap.toFixed(2)}`
    );
    this.cap = cap;
    this.attempted = attempted;
  }
}

export class InvalidConfigError extends BacktestError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid strategy config: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));
