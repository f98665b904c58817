import 'dotenv/config';
import { Command } from 'commander';
import path from 'path';
import { formatSummary, summarizeResult } from '../analytics/summary';
import { parseStrategyConfig } from '../core/schema';
import { RunLogger } from '../core/types';
import { readJSONFile } from '../core/utils';
import { getDataProvider } from '../data/marketData';
import { compareAccountTypes } from '../engine/compare';
import { runBacktest } from '../engine/runner';
import { writeBacktestReports } from '../report/exportReports';

type BacktestCliOptions = {
  config: string;
  provider?: string;
  dataDir?: string;
  out?: string;
  compareAccounts?: boolean;
  quiet?: boolean;
};

const silentLogger: RunLogger = { log: () => undefined, warn: () => undefined };

export const buildProgram = () =>
  new Command()
    .name('taxlot-backtest')
    .description('Tax-aware daily portfolio backtest')
    .option('--config <path>', 'strategy config JSON', 'src/config/default.json')
    .option('--provider <name>', 'market data provider: stub | csv')
    .option('--data-dir <dir>', 'directory for the csv provider')
    .option('--out <dir>', 'report output directory')
    .option('--compare-accounts', 'run the strategy once per account type and compare')
    .option('--quiet', 'only print the summary');

export const runCli = async (argv: string[] = process.argv) => {
  const opts = buildProgram().parse(argv).opts<BacktestCliOptions>();
  const config = parseStrategyConfig(readJSONFile(path.resolve(process.cwd(), opts.config)));
  const provider = getDataProvider(opts.provider, opts.dataDir);
  const logger = opts.quiet ? silentLogger : console;

  if (opts.compareAccounts) {
    const summaries = await compareAccountTypes(config, provider, undefined, { logger });
    for (const summary of Object.values(summaries)) {
      if (summary) console.log(formatSummary(summary));
    }
    return;
  }

  const result = await runBacktest(config, provider, {
    logger,
    onProgress: ({ dayIndex, totalDays, date }) => logger.log(`  ${date} (${dayIndex + 1}/${totalDays})`)
  });
  const outDir = path.resolve(process.cwd(), opts.out ?? process.env.BACKTEST_OUT_DIR ?? 'reports');
  const paths = writeBacktestReports(result, outDir);
  for (const warning of result.warnings) logger.warn(`warning: ${warning}`);
  console.log(formatSummary(summarizeResult(result)));
  console.log(`Reports written to ${path.dirname(paths.summary)}`);
};

if (require.main === module) {
  runCli().catch((err) => {
    console.error('backtest failed', err);
    process.exitCode = 1;
  });
}
