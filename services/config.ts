import { ModelKey, SeriesKey } from '../types';

export const DEFAULT_SOURCE_URL = '/crypto_volatility_forecast_results.csv';

export const REQUIRED_COLUMNS = {
  date: 'Date',
  actual: 'Actual_Volatility',
  garch: 'GARCH_Volatility',
  predicted: 'Predicted_Volatility',
} as const;

export const HISTOGRAM_BINS = 30;
export const TABLE_DECIMALS = 4;
export const CHART_HEIGHT = 500;

export const OVERLAY_AXES = {
  xLabel: 'Date',
  yLabel: '7-Day Volatility',
};

export const SERIES_STYLE: Record<SeriesKey, { name: string; color: string; strokeWidth: number; dashed: boolean }> = {
  actual: { name: 'Actual Volatility', color: '#2563EB', strokeWidth: 3, dashed: false },
  garch: { name: 'GARCH Forecast', color: '#16A34A', strokeWidth: 2, dashed: true },
  lstm: { name: 'LSTM+GARCH Forecast', color: '#DC2626', strokeWidth: 2, dashed: false },
};

export const HISTOGRAM_TITLES: Record<ModelKey, string> = {
  garch: 'GARCH Forecast Errors',
  lstm: 'LSTM+GARCH Forecast Errors',
};
