import { StrategyConfig } from '../core/types';

const equalWeights = (symbols: string[]): Record<string, number> => {
  const weight = symbols.length ? 1 / symbols.length : 0;
  return Object.fromEntries(symbols.map((s) => [s, weight]));
};

/**
 * Target weight per universe symbol, summing to 1. Custom weights come from
 * positionSizing.customWeights, else universe.weights; unlisted symbols get 0.
 */
export const computeTargetWeights = (config: StrategyConfig): Record<string, number> => {
  const { symbols } = config.universe;
  const custom = config.positionSizing.customWeights ?? config.universe.weights;
  const useCustom = config.positionSizing.method === 'CUSTOM_WEIGHTS' || config.universe.weights !== undefined;
  if (!useCustom || !custom) return equalWeights(symbols);

  const raw = Object.fromEntries(symbols.map((s) => [s, custom[s] ?? 0]));
  const total = Object.values(raw).reduce((a, b) => a + b, 0);
  if (total <= 0) return equalWeights(symbols);
  return Object.fromEntries(Object.entries(raw).map(([s, w]) => [s, w / total]));
};
