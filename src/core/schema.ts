import { z } from 'zod';
import {
  IRA_CATCHUP_LIMIT,
  IRA_CONTRIBUTION_LIMIT,
  ROTH_CATCHUP_LIMIT,
  ROTH_CONTRIBUTION_LIMIT,
  DEFAULT_COMMISSION,
  DEFAULT_SLIPPAGE_BPS
} from './constants';
import { InvalidConfigError } from './errors';
import { isISODate } from './time';
import { StrategyConfig } from './types';

const isoDate = z.string().refine(isISODate, { message: 'must be an ISO date (YYYY-MM-DD)' });
const rate = z.number().min(0).max(1);
const weightMap = z.record(z.string(), z.number().min(0, { message: 'weights must be non-negative' }));

const taxSchema = z.object({
  federalOrdinary: rate.default(0.32),
  federalLtcg: rate.default(0.15),
  state: rate.default(0.06),
  qualifiedDividendPct: rate.default(0.8),
  applyWashSale: z.boolean().default(true),
  payTaxesFromExternal: z.boolean().default(false),
  withdrawalTaxRateForIra: rate.default(0.25)
});

const capsSchema = z.object({
  enforce: z.boolean().default(true),
  catchUpEligible: z.boolean().default(false),
  ira: z.number().min(0).default(IRA_CONTRIBUTION_LIMIT),
  iraCatchUp: z.number().min(0).default(IRA_CATCHUP_LIMIT),
  roth: z.number().min(0).default(ROTH_CONTRIBUTION_LIMIT),
  rothCatchUp: z.number().min(0).default(ROTH_CATCHUP_LIMIT)
});

export const strategyConfigSchema = z
  .object({
    meta: z.object({ name: z.string().min(1), notes: z.string().default('') }).default({ name: 'strategy' }),
    universe: z.object({
      symbols: z.array(z.string().min(1)).nonempty({ message: 'universe must contain at least one symbol' }),
      weights: weightMap.optional()
    }),
    period: z.object({
      start: isoDate,
      end: isoDate,
      calendar: z.enum(['SESSIONS', 'WEEKDAYS']).default('SESSIONS')
    }),
    initialCash: z.number().positive({ message: 'initial cash must be positive' }),
    account: z
      .object({
        type: z.enum(['TAXABLE', 'TRADITIONAL_IRA', 'ROTH_IRA', 'PLAN_529']).default('TAXABLE'),
        tax: taxSchema.default({}),
        contributionCaps: capsSchema.default({})
      })
      .default({}),
    deposits: z
      .object({
        cadence: z.enum(['none', 'daily', 'weekly', 'monthly', 'quarterly', 'yearly', 'every_market_day']),
        amount: z.number().min(0)
      })
      .optional(),
    dividends: z.object({ mode: z.enum(['DRIP', 'CASH']).default('DRIP') }).default({}),
    rebalancing: z
      .object({
        type: z.enum(['CALENDAR', 'DRIFT', 'BOTH', 'CASHFLOW_ONLY']).default('CALENDAR'),
        calendar: z.object({ period: z.enum(['D', 'W', 'M', 'Q', 'Y']) }).optional(),
        drift: z.object({ absPct: rate.optional(), relPct: z.number().min(0).optional() }).optional()
      })
      .default({}),
    lots: z.object({ method: z.enum(['FIFO', 'LIFO', 'HIFO']).default('HIFO') }).default({}),
    frictions: z
      .object({
        commissionPerTrade: z.number().min(0).default(DEFAULT_COMMISSION),
        slippageBps: z.number().min(0).default(DEFAULT_SLIPPAGE_BPS),
        useActualEtfEr: z.boolean().default(true)
      })
      .default({}),
    positionSizing: z
      .object({
        method: z.enum(['EQUAL_WEIGHT', 'CUSTOM_WEIGHTS']).default('EQUAL_WEIGHT'),
        customWeights: weightMap.optional()
      })
      .default({}),
    benchmark: z.array(z.string().min(1)).default(['SPY'])
  })
  .superRefine((cfg, ctx) => {
    if (isISODate(cfg.period.start) && isISODate(cfg.period.end) && cfg.period.end < cfg.period.start) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['period', 'end'], message: 'end must not be before start' });
    }
  });

export type StrategyConfigInput = z.input<typeof strategyConfigSchema>;

export const validateStrategyConfig = (
  input: unknown
): { success: true; value: StrategyConfig } | { success: false; errors: string[] } => {
  const result = strategyConfigSchema.safeParse(input);
  if (result.success) {
    return { success: true, value: result.data };
  }
  const errors = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
  return { success: false, errors };
};

/** Same as validateStrategyConfig but throws, for callers that cannot continue without a config. */
export const parseStrategyConfig = (input: unknown): StrategyConfig => {
  const result = validateStrategyConfig(input);
  if (!result.success) {
    throw new InvalidConfigError(result.errors);
  }
  return result.value;
};

/**
 * Structural checks for configs built in code rather than parsed, run before any simulation.
 */
export const assertRunnableConfig = (config: StrategyConfig) => {
  const issues: string[] = [];
  if (!config.universe.symbols.length) issues.push('universe.symbols: universe must contain at least one symbol');
  if (!isISODate(config.period.start)) issues.push(`period.start: invalid date ${config.period.start}`);
  if (!isISODate(config.period.end)) issues.push(`period.end: invalid date ${config.period.end}`);
  if (config.period.end < config.period.start) issues.push('period.end: end must not be before start');
  if (!(config.initialCash > 0)) issues.push('initialCash: initial cash must be positive');
  const weights = { ...config.universe.weights, ...config.positionSizing.customWeights };
  for (const [symbol, weight] of Object.entries(weights)) {
    if (weight < 0) issues.push(`weights.${symbol}: weights must be non-negative`);
  }
  if (issues.length) throw new InvalidConfigError(issues);
};
