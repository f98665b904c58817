import fs from 'fs';
import path from 'path';
import { DividendEvent, HistoricalDataProvider, PriceBar, SplitEvent } from './marketData.types';

type CsvRow = Record<string, string>;

// Plain comma-separated files with a header row; no quoted fields.
export const parseCsv = (text: string): CsvRow[] => {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (!lines.length) return [];
  const header = lines[0].split(',').map((h) => h.trim().toLowerCase());
  return lines.slice(1).map((line) => {
    const cells = line.split(',');
    const row: CsvRow = {};
    header.forEach((name, i) => {
      row[name] = (cells[i] ?? '').trim();
    });
    return row;
  });
};

const toNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
};

const inRange = (date: string, start: string, end: string) => date >= start && date <= end;

/**
 * Reads history from a directory:
 *   bars/<SYM>.csv       date,open,high,low,close,adj_close,volume
 *   dividends/<SYM>.csv  ex_date,pay_date,amount,qualified_pct
 *   splits/<SYM>.csv     ex_date,ratio
 *   metadata.csv         symbol,expense_ratio
 * Missing files mean "no events"; a missing bars file is an error.
 */
export class CsvDataProvider implements HistoricalDataProvider {
  private metadata?: Map<string, number>;

  constructor(private readonly dataDir: string) {}

  async getBars(symbol: string, start: string, end: string): Promise<PriceBar[]> {
    const file = path.join(this.dataDir, 'bars', `${symbol}.csv`);
    if (!fs.existsSync(file)) {
      throw new Error(`No bar file for ${symbol} at ${file}`);
    }
    const bars: PriceBar[] = [];
    for (const row of await this.readRows(file)) {
      const close = toNumber(row.close);
      if (!row.date || close === undefined || !inRange(row.date, start, end)) continue;
      bars.push({
        date: row.date,
        open: toNumber(row.open) ?? close,
        high: toNumber(row.high) ?? close,
        low: toNumber(row.low) ?? close,
        close,
        adjClose: toNumber(row.adj_close) ?? close,
        volume: toNumber(row.volume) ?? 0
      });
    }
    return bars.sort((a, b) => a.date.localeCompare(b.date));
  }

  async getDividends(symbol: string, start: string, end: string): Promise<DividendEvent[]> {
    const file = path.join(this.dataDir, 'dividends', `${symbol}.csv`);
    if (!fs.existsSync(file)) return [];
    const events: DividendEvent[] = [];
    for (const row of await this.readRows(file)) {
      const amount = toNumber(row.amount);
      if (!row.ex_date || amount === undefined || !inRange(row.ex_date, start, end)) continue;
      events.push({
        exDate: row.ex_date,
        payDate: row.pay_date || undefined,
        amount,
        qualifiedPct: toNumber(row.qualified_pct)
      });
    }
    return events.sort((a, b) => a.exDate.localeCompare(b.exDate));
  }

  async getSplits(symbol: string, start: string, end: string): Promise<SplitEvent[]> {
    const file = path.join(this.dataDir, 'splits', `${symbol}.csv`);
    if (!fs.existsSync(file)) return [];
    const splits: SplitEvent[] = [];
    for (const row of await this.readRows(file)) {
      const ratio = toNumber(row.ratio);
      if (!row.ex_date || ratio === undefined || !inRange(row.ex_date, start, end)) continue;
      splits.push({ exDate: row.ex_date, ratio });
    }
    return splits;
  }

  async getExpenseRatio(symbol: string): Promise<number | undefined> {
    if (!this.metadata) {
      this.metadata = new Map();
      const file = path.join(this.dataDir, 'metadata.csv');
      if (fs.existsSync(file)) {
        for (const row of await this.readRows(file)) {
          const er = toNumber(row.expense_ratio);
          if (row.symbol && er !== undefined) this.metadata.set(row.symbol, er);
        }
      }
    }
    return this.metadata.get(symbol);
  }

  private async readRows(file: string): Promise<CsvRow[]> {
    return parseCsv(await fs.promises.readFile(file, 'utf-8'));
  }
}
