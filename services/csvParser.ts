import Papa from 'papaparse';
import { format, isValid, parse, parseISO } from 'date-fns';
import { ForecastRecord } from '../types';
import { REQUIRED_COLUMNS } from './config';
import { SchemaError } from './errors';

export interface ParsedForecastCsv {
  records: ForecastRecord[];
  droppedRows: number;
}

const DATE_FORMATS = [
  'yyyy-MM-dd',
  'yyyy-MM-dd HH:mm:ss',
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy/MM/dd',
  'MM/dd/yyyy',
];

// Trailing UTC offset after a time of day, e.g. `00:00:00+00:00` or `00:00:00.000Z`.
const OFFSET_SUFFIX = /(\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)\s*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Normalizes a date cell to YYYY-MM-DD, or null when it cannot be read.
 * The day is the one written in the cell; an offset never shifts it.
 */
export const toIsoDay = (value: string | undefined): string | null => {
  if (!value) return null;
  const text = value.trim().replace(OFFSET_SUFFIX, '$1');
  if (!text) return null;

  const ref = new Date();
  for (const f of DATE_FORMATS) {
    const d = parse(text, f, ref);
    if (isValid(d)) return format(d, 'yyyy-MM-dd');
  }
  const iso = parseISO(text);
  return isValid(iso) ? format(iso, 'yyyy-MM-dd') : null;
};

export const toNumber = (value: string | undefined): number | null => {
  if (value === undefined) return null;
  const text = value.trim();
  if (!text) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
};

export const parseForecastCsv = (csvText: string): ParsedForecastCsv => {
  const parsed = Papa.parse<Record<string, string | undefined>>(csvText.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: h => h.trim(),
  });

  const fields = parsed.meta.fields ?? [];
  const required = Object.values(REQUIRED_COLUMNS);
  if (fields.length === 0) {
    throw new SchemaError(required, 'File has no header row');
  }
  const missing = required.filter(col => !fields.includes(col));
  if (missing.length > 0) {
    throw new SchemaError(missing);
  }

  const records: ForecastRecord[] = [];
  let droppedRows = 0;

  for (const row of parsed.data) {
    const date = toIsoDay(row[REQUIRED_COLUMNS.date]);
    if (date === null) {
      droppedRows++;
      continue;
    }
    records.push({
      date,
      actualVolatility: toNumber(row[REQUIRED_COLUMNS.actual]),
      garchVolatility: toNumber(row[REQUIRED_COLUMNS.garch]),
      predictedVolatility: toNumber(row[REQUIRED_COLUMNS.predicted]),
    });
  }

  return { records, droppedRows };
};
