import { HistoricalDataProvider } from './marketData.types';
import { defaultMarketData, StubDataProvider } from './marketData.stub';
import { CsvDataProvider } from './marketData.csv';

export type DataProviderKind = 'stub' | 'csv';

export const isDataProviderKind = (value: string): value is DataProviderKind => value === 'stub' || value === 'csv';

/**
 * Picks the history source. Arguments win over MARKET_DATA_PROVIDER / MARKET_DATA_DIR;
 * an unknown provider name falls back to stub data with a warning.
 */
export const getDataProvider = (
  kind: string = process.env.MARKET_DATA_PROVIDER || 'stub',
  dataDir: string = process.env.MARKET_DATA_DIR || 'data'
): HistoricalDataProvider => {
  const normalized = kind.toLowerCase();
  if (!isDataProviderKind(normalized)) {
    console.warn(`Unknown MARKET_DATA_PROVIDER=${kind}; using stub market data.`);
    return defaultMarketData;
  }
  switch (normalized) {
    case 'csv':
      return new CsvDataProvider(dataDir);
    case 'stub':
      return defaultMarketData;
  }
};

export { StubDataProvider, CsvDataProvider };
