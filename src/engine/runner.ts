import { calendarFromSessions, TradingCalendar, WeekdayCalendar } from '../calendar/tradingCalendar';
import { TRADING_DAYS_PER_YEAR } from '../core/constants';
import { ContributionCapExceededError, errorMessage } from '../core/errors';
import { assertRunnableConfig } from '../core/schema';
import { yearOf } from '../core/time';
import {
  BacktestResult,
  BenchmarkPoint,
  EquityPoint,
  ProgressUpdate,
  RunLogger,
  StrategyConfig,
  TaxSummary
} from '../core/types';
import { loadMarketData, MarketDataSet, pricesOn, sessionDates } from '../data/loader';
import { HistoricalDataProvider } from '../data/marketData.types';
import { Rebalancer } from '../execution/rebalancer';
import { executeTradeIntents } from '../execution/tradeExecutor';
import { Portfolio } from '../ledger/portfolio';
import { TaxCalculator } from '../tax/taxCalculator';
import { simulateBenchmark } from './benchmark';
import { enforceContributionCap, isDepositDay } from './deposits';
import { computeTargetWeights } from './weights';

export interface RunOptions {
  logger?: RunLogger;
  onProgress?: (update: ProgressUpdate) => void;
  progressEvery?: number;
  idFactory?: () => string;
}

export interface SimulationInput {
  config: StrategyConfig;
  marketData: MarketDataSet;
  calendar: TradingCalendar;
  // benchmark symbols outside the universe; universe data is reused when a symbol is in both
  benchmarkData?: MarketDataSet;
  warnings?: string[];
}

const DEFAULT_PROGRESS_EVERY = 21;

export const dailyExpenseDrag = (expenseRatio: number): number => Math.pow(1 + expenseRatio, 1 / TRADING_DAYS_PER_YEAR) - 1;

const isYearEnd = (tradingDays: string[], index: number): boolean =>
  index >= tradingDays.length - 1 || yearOf(tradingDays[index + 1]) > yearOf(tradingDays[index]);

const processDividends = (
  portfolio: Portfolio,
  config: StrategyConfig,
  marketData: MarketDataSet,
  date: string,
  prices: Record<string, number>,
  warnings: string[]
) => {
  for (const [symbol, entry] of marketData) {
    for (const event of entry.dividends) {
      if (event.exDate !== date) continue;
      const held = portfolio.getTotalQuantity(symbol);
      if (held <= 0) continue;
      const amount = held * event.amount;
      const qualifiedPct = event.qualifiedPct ?? config.account.tax.qualifiedDividendPct;
      portfolio.recordDividend(symbol, amount, date, qualifiedPct, held);

      const price = prices[symbol];
      if (config.dividends.mode !== 'DRIP' || price === undefined) continue;
      try {
        portfolio.buy(symbol, amount / price, price, date, 0, 0, 'DRIP');
      } catch (err) {
        warnings.push(`DRIP failed on ${date} for ${symbol}, dividend kept as cash - ${errorMessage(err)}`);
      }
    }
  }
};

const applyExpenseDrag = (portfolio: Portfolio, marketData: MarketDataSet) => {
  for (const [symbol, entry] of marketData) {
    if (entry.expenseRatio > 0) {
      portfolio.applyCostBasisDrag(symbol, dailyExpenseDrag(entry.expenseRatio));
    }
  }
};

const warnUnpriced = (targetWeights: Record<string, number>, prices: Record<string, number>, date: string, warnings: string[]) => {
  for (const [symbol, weight] of Object.entries(targetWeights)) {
    if (weight > 0 && prices[symbol] === undefined) {
      warnings.push(`No price data for ${symbol} on ${date}, skipping its trades`);
    }
  }
};

/**
 * Runs the daily loop over already-loaded data. Each trading day, in order: prices,
 * dividends, deposit, expense drag, deposit investing or rebalance, snapshot, year-end tax.
 * A deposit day only invests the deposit, the first day included; otherwise the first day
 * always gets a full rebalance.
 * The loop never fetches; everything it reads is in `marketData`.
 */
export const simulateStrategy = (input: SimulationInput, options: RunOptions = {}): BacktestResult => {
  const { config, marketData, calendar, benchmarkData } = input;
  const warnings = input.warnings ?? [];
  const logger = options.logger ?? console;
  const progressEvery = Math.max(1, options.progressEvery ?? DEFAULT_PROGRESS_EVERY);
  assertRunnableConfig(config);

  const accountType = config.account.type;
  const portfolio = new Portfolio({
    initialCash: config.initialCash,
    accountType,
    lotMethod: config.lots.method,
    applyWashSale: config.account.tax.applyWashSale,
    idFactory: options.idFactory
  });
  const rebalancer = new Rebalancer(config.rebalancing, calendar, accountType);
  const taxCalculator = new TaxCalculator(config.account.tax);
  const targetWeights = computeTargetWeights(config);
  const tradingDays = calendar.tradingDays(config.period.start, config.period.end);
  logger.log(`Backtesting ${tradingDays.length} trading days...`);

  const equityCurve: EquityPoint[] = [];
  let lastPrices: Record<string, number> = {};
  let firstDay = true;

  for (let i = 0; i < tradingDays.length; i++) {
    const date = tradingDays[i];
    const prices = pricesOn(marketData, date);

    if (Object.keys(prices).length) {
      lastPrices = prices;
      processDividends(portfolio, config, marketData, date, prices, warnings);

      let depositMade = 0;
      const deposits = config.deposits;
      if (deposits && deposits.amount > 0 && isDepositDay(date, deposits.cadence, calendar)) {
        try {
          enforceContributionCap(portfolio, config.account, date, deposits.amount);
          portfolio.addDeposit(deposits.amount, date);
          depositMade = deposits.amount;
        } catch (err) {
          if (!(err instanceof ContributionCapExceededError)) throw err;
          warnings.push(`Contribution cap reached on ${date}, skipping deposit`);
        }
      }

      if (config.frictions.useActualEtfEr) applyExpenseDrag(portfolio, marketData);

      if (depositMade > 0) {
        warnUnpriced(targetWeights, prices, date, warnings);
        const intents = rebalancer.generateDepositTrades(targetWeights, depositMade, prices);
        executeTradeIntents(portfolio, intents, prices, date, config.frictions, warnings);
      } else {
        // evaluated on the first day too, so the calendar schedule starts there
        const decision = rebalancer.shouldRebalance(date, portfolio.getCurrentWeights(prices), targetWeights, false);
        if (decision.shouldRebalance || firstDay) {
          warnUnpriced(targetWeights, prices, date, warnings);
          const intents = rebalancer.generateRebalanceTrades(portfolio, targetWeights, prices);
          executeTradeIntents(portfolio, intents, prices, date, config.frictions, warnings);
        }
      }
      firstDay = false;

      const positionsValue = portfolio.getPositionsValue(prices);
      equityCurve.push({ date, portfolioValue: portfolio.cash + positionsValue, cash: portfolio.cash, positionsValue });
    }

    if (isYearEnd(tradingDays, i)) {
      const year = yearOf(date);
      const tax = taxCalculator.applyYearEndTax(year, portfolio);
      if (tax > 0) logger.log(`Year ${year} tax: $${tax.toFixed(2)}`);
      if (portfolio.cash < 0) {
        warnings.push(`Cash is negative after ${year} tax payment: $${portfolio.cash.toFixed(2)}`);
      }
    }

    if (options.onProgress && ((i + 1) % progressEvery === 0 || i === tradingDays.length - 1)) {
      options.onProgress({
        dayIndex: i,
        totalDays: tradingDays.length,
        date,
        portfolioValue: portfolio.getTotalValue(lastPrices)
      });
    }
  }

  const simulatedYears = Array.from(new Set(equityCurve.map((p) => yearOf(p.date)))).sort((a, b) => a - b);
  const taxSummaries: TaxSummary[] = simulatedYears.map((year) => taxCalculator.calculateAnnualTax(year, portfolio));

  const benchmarkEquity: Record<string, BenchmarkPoint[]> = {};
  for (const symbol of config.benchmark) {
    const entry = marketData.get(symbol) ?? benchmarkData?.get(symbol);
    if (!entry) {
      warnings.push(`No benchmark data for ${symbol}`);
      continue;
    }
    benchmarkEquity[symbol] = simulateBenchmark(entry.priceByDate, tradingDays, config.initialCash, calendar, config.deposits);
  }

  const trades = portfolio.getTrades();
  const finalValue = equityCurve.length ? equityCurve[equityCurve.length - 1].portfolioValue : portfolio.cash;
  logger.log(`Backtest complete. Final value: $${finalValue.toFixed(2)}`);

  return {
    config,
    equityCurve,
    trades,
    lots: portfolio.getAllLots(),
    finalPositions: portfolio.getAllPositions(lastPrices),
    taxSummaries,
    taxDrag: taxCalculator.calculateTaxDrag(portfolio, equityCurve),
    afterTaxValue: taxCalculator.calculateAfterTaxValue(portfolio, lastPrices),
    benchmarkEquity,
    warnings,
    diagnostics: {
      totalTrades: trades.length,
      totalSymbols: config.universe.symbols.length,
      tradingDays: tradingDays.length,
      simulatedDays: equityCurve.length,
      totalDeposits: portfolio.getTotalDeposits(),
      totalTaxesPaid: portfolio.getTotalTaxesPaid()
    }
  };
};

const loadBenchmarkData = async (
  provider: HistoricalDataProvider,
  config: StrategyConfig,
  warnings: string[],
  logger: RunLogger
): Promise<MarketDataSet | undefined> => {
  const extra = config.benchmark.filter((s) => !config.universe.symbols.includes(s));
  if (!extra.length) return undefined;
  try {
    return await loadMarketData(provider, extra, config.period, warnings, logger);
  } catch (err) {
    warnings.push(`Benchmark data unavailable: ${errorMessage(err)}`);
    return undefined;
  }
};

/**
 * Validates the config, loads all history up front and runs the simulation. The calendar
 * is derived from the loaded sessions unless the config asks for plain weekdays.
 */
export const runBacktest = async (
  config: StrategyConfig,
  provider: HistoricalDataProvider,
  options: RunOptions = {}
): Promise<BacktestResult> => {
  assertRunnableConfig(config);
  const logger = options.logger ?? console;
  const warnings: string[] = [];
  const [marketData, benchmarkData] = await Promise.all([
    loadMarketData(provider, config.universe.symbols, config.period, warnings, logger),
    loadBenchmarkData(provider, config, warnings, logger)
  ]);
  const calendar =
    config.period.calendar === 'WEEKDAYS'
      ? new WeekdayCalendar()
      : calendarFromSessions(sessionDates(marketData), config.period);
  return simulateStrategy({ config, marketData, calendar, benchmarkData, warnings }, options);
};
