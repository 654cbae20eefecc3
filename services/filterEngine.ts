import { DateRange, ForecastRecord } from '../types';

// ISO day strings compare lexicographically in calendar order.

export const filterByDateRange = (
  records: readonly ForecastRecord[],
  range: DateRange
): ForecastRecord[] => records.filter(r => r.date >= range.start && r.date <= range.end);

export const getDateBounds = (records: readonly ForecastRecord[]): DateRange | null => {
  if (records.length === 0) return null;
  let start = records[0].date;
  let end = records[0].date;
  for (const r of records) {
    if (r.date < start) start = r.date;
    if (r.date > end) end = r.date;
  }
  return { start, end };
};

const clampDay = (day: string, bounds: DateRange) =>
  day < bounds.start ? bounds.start : day > bounds.end ? bounds.end : day;

/** Orders the ends and pulls both inside the bounds. */
export const clampDateRange = (range: DateRange, bounds: DateRange): DateRange => {
  const [a, b] = range.start <= range.end ? [range.start, range.end] : [range.end, range.start];
  return { start: clampDay(a, bounds), end: clampDay(b, bounds) };
};
