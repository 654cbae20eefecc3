import { TABLE_DECIMALS } from './config';

export const formatValue = (value: number | null, decimals = TABLE_DECIMALS): string =>
  value === null ? '—' : value.toFixed(decimals);

export const formatPct = (value: number | null): string =>
  value === null ? 'n/a' : `${value.toFixed(1)}%`;

export const formatMetric = (value: number | null): string =>
  value === null ? 'n/a' : value.toFixed(TABLE_DECIMALS);
