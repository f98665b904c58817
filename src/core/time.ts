const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

export const isISODate = (value: string): boolean => {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && formatISODate(parsed) === value;
};

export const parseISODate = (value: string): Date => {
  if (!isISODate(value)) {
    throw new Error(`Invalid ISO date: ${value}`);
  }
  return new Date(`${value}T00:00:00Z`);
};

export const makeISODate = (year: number, month: number, day: number): string =>
  formatISODate(new Date(Date.UTC(year, month - 1, day)));

export const addDays = (date: string, days: number): string => {
  const d = parseISODate(date);
  d.setUTCDate(d.getUTCDate() + days);
  return formatISODate(d);
};

// Whole calendar days from `from` to `to`.
export const daysBetween = (from: string, to: string): number =>
  Math.round((parseISODate(to).getTime() - parseISODate(from).getTime()) / DAY_MS);

export const yearOf = (date: string): number => Number(date.slice(0, 4));
export const monthOf = (date: string): number => Number(date.slice(5, 7));
export const quarterOf = (date: string): number => Math.floor((monthOf(date) - 1) / 3) + 1;

// 0 = Sunday ... 6 = Saturday
export const weekdayOf = (date: string): number => parseISODate(date).getUTCDay();

export const isWeekend = (date: string): boolean => {
  const day = weekdayOf(date);
  return day === 0 || day === 6;
};
