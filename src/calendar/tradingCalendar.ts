import { addDays, daysBetween, isWeekend, makeISODate, monthOf, yearOf } from '../core/time';

export type AlignRule = 'FIRST_BUSINESS_DAY' | 'LAST_BUSINESS_DAY' | 'NEXT' | 'PREVIOUS';

export interface TradingCalendar {
  tradingDays(start: string, end: string): string[];
  isTradingDay(date: string): boolean;
  nextTradingDay(date: string): string;
  previousTradingDay(date: string): string;
  firstTradingDayOfMonth(year: number, month: number): string;
  lastTradingDayOfMonth(year: number, month: number): string;
  firstTradingDayOfQuarter(year: number, quarter: number): string;
  firstTradingDayOfYear(year: number): string;
  alignToBusinessDay(date: string, rule?: AlignRule): string;
}

const MAX_SEARCH_DAYS = 10;

/**
 * Monday–Friday sessions minus an explicit holiday set.
 */
export class WeekdayCalendar implements TradingCalendar {
  private holidays: Set<string>;
  private cache = new Map<string, string[]>();

  constructor(holidays: Iterable<string> = [], private readonly searchLimit = MAX_SEARCH_DAYS) {
    this.holidays = new Set(holidays);
  }

  tradingDays(start: string, end: string): string[] {
    const key = `${start}|${end}`;
    const cached = this.cache.get(key);
    if (cached) return cached;
    const days: string[] = [];
    for (let d = start; d <= end; d = addDays(d, 1)) {
      if (this.isTradingDay(d)) days.push(d);
    }
    this.cache.set(key, days);
    return days;
  }

  isTradingDay(date: string): boolean {
    return !isWeekend(date) && !this.holidays.has(date);
  }

  nextTradingDay(date: string): string {
    return this.step(date, 1);
  }

  previousTradingDay(date: string): string {
    return this.step(date, -1);
  }

  firstTradingDayOfMonth(year: number, month: number): string {
    return this.alignToBusinessDay(makeISODate(year, month, 1), 'FIRST_BUSINESS_DAY');
  }

  lastTradingDayOfMonth(year: number, month: number): string {
    // day 0 of the following month is the last day of this one
    return this.alignToBusinessDay(makeISODate(year, month + 1, 0), 'LAST_BUSINESS_DAY');
  }

  firstTradingDayOfQuarter(year: number, quarter: number): string {
    return this.firstTradingDayOfMonth(year, (quarter - 1) * 3 + 1);
  }

  firstTradingDayOfYear(year: number): string {
    return this.firstTradingDayOfMonth(year, 1);
  }

  alignToBusinessDay(date: string, rule: AlignRule = 'FIRST_BUSINESS_DAY'): string {
    switch (rule) {
      case 'NEXT':
        return this.nextTradingDay(date);
      case 'PREVIOUS':
        return this.previousTradingDay(date);
      case 'LAST_BUSINESS_DAY':
        return this.isTradingDay(date) ? date : this.previousTradingDay(date);
      case 'FIRST_BUSINESS_DAY':
      default:
        return this.isTradingDay(date) ? date : this.nextTradingDay(date);
    }
  }

  private step(date: string, direction: 1 | -1): string {
    let current = date;
    for (let i = 0; i < this.searchLimit; i++) {
      current = addDays(current, direction);
      if (this.isTradingDay(current)) return current;
    }
    throw new Error(`Could not find ${direction > 0 ? 'next' : 'previous'} trading day from ${date}`);
  }
}

/**
 * Builds a calendar from the sessions actually present in loaded bars. Every weekday without
 * a session is a holiday from the first day of the month the data (or the requested period)
 * starts in, through the later of the last session and the period end. Beyond that span it
 * behaves as weekdays.
 */
export const calendarFromSessions = (
  sessions: Iterable<string>,
  period?: { start: string; end: string }
): WeekdayCalendar => {
  const sorted = Array.from(new Set(sessions)).sort();
  if (!sorted.length) return new WeekdayCalendar();
  const present = new Set(sorted);
  const earliest = period && period.start < sorted[0] ? period.start : sorted[0];
  const first = makeISODate(yearOf(earliest), monthOf(earliest), 1);
  const lastSession = sorted[sorted.length - 1];
  const last = period && period.end > lastSession ? period.end : lastSession;
  const holidays: string[] = [];
  for (let d = first; d <= last; d = addDays(d, 1)) {
    if (!isWeekend(d) && !present.has(d)) holidays.push(d);
  }
  // a data gap may be longer than any real market closure
  return new WeekdayCalendar(holidays, daysBetween(first, last) + MAX_SEARCH_DAYS);
};
