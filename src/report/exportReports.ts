import fs from 'fs';
import path from 'path';
import { summarizeResult } from '../analytics/summary';
import { BacktestResult } from '../core/types';
import { ensureDir, writeJSONFile } from '../core/utils';

export interface ReportPaths {
  equityCurve: string;
  trades: string;
  lots: string;
  taxSummaries: string;
  summary: string;
}

const csvCell = (value: string | number | undefined): string => {
  if (value === undefined) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const equityCurveCsv = (result: BacktestResult): string => {
  const lines = ['date,portfolio_value,cash,positions_value'];
  for (const p of result.equityCurve) {
    lines.push([p.date, p.portfolioValue.toFixed(2), p.cash.toFixed(2), p.positionsValue.toFixed(2)].join(','));
  }
  return lines.join('\n');
};

export const tradesCsv = (result: BacktestResult): string => {
  const lines = ['trade_id,date,symbol,action,quantity,price,commission,slippage,cash_impact,lot_ids,notes'];
  for (const t of result.trades) {
    lines.push(
      [
        t.tradeId,
        t.date,
        t.symbol,
        t.action,
        t.quantity.toFixed(6),
        t.price.toFixed(4),
        t.commission.toFixed(2),
        t.slippage.toFixed(4),
        t.cashImpact.toFixed(2),
        t.lotIds.join(';'),
        t.notes
      ]
        .map(csvCell)
        .join(',')
    );
  }
  return lines.join('\n');
};

export const writeBacktestReports = (result: BacktestResult, outDir: string): ReportPaths => {
  ensureDir(outDir);
  const paths: ReportPaths = {
    equityCurve: path.join(outDir, 'equity_curve.csv'),
    trades: path.join(outDir, 'trades.csv'),
    lots: path.join(outDir, 'lots.json'),
    taxSummaries: path.join(outDir, 'tax_summaries.json'),
    summary: path.join(outDir, 'summary.json')
  };
  fs.writeFileSync(paths.equityCurve, equityCurveCsv(result));
  fs.writeFileSync(paths.trades, tradesCsv(result));
  writeJSONFile(paths.lots, result.lots);
  writeJSONFile(paths.taxSummaries, { taxSummaries: result.taxSummaries, taxDrag: result.taxDrag });
  writeJSONFile(paths.summary, {
    ...summarizeResult(result),
    diagnostics: result.diagnostics,
    warnings: result.warnings
  });
  return paths;
};
