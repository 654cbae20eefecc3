import {
  ChartBundle,
  DisplayToggles,
  ForecastRecord,
  HistogramResult,
  ModelKey,
  OverlayChartSpec,
  SeriesKey,
  SeriesSpec,
} from '../types';
import { HISTOGRAM_BINS, HISTOGRAM_TITLES, OVERLAY_AXES, SERIES_STYLE } from './config';
import { histogram, residuals } from './mathUtils';

const FIELD: Record<SeriesKey, (r: ForecastRecord) => number | null> = {
  actual: r => r.actualVolatility,
  garch: r => r.garchVolatility,
  lstm: r => r.predictedVolatility,
};

const buildSeries = (key: SeriesKey, subset: readonly ForecastRecord[]): SeriesSpec => ({
  key,
  ...SERIES_STYLE[key],
  points: subset.map(r => ({ date: r.date, value: FIELD[key](r) })),
});

export const composeOverlay = (
  subset: readonly ForecastRecord[],
  toggles: DisplayToggles
): OverlayChartSpec => {
  const keys: SeriesKey[] = ['actual'];
  if (toggles.showGarch) keys.push('garch');
  if (toggles.showLstm) keys.push('lstm');
  return { ...OVERLAY_AXES, series: keys.map(k => buildSeries(k, subset)) };
};

export const composeErrorHistogram = (
  subset: readonly ForecastRecord[],
  model: ModelKey,
  binCount = HISTOGRAM_BINS
): HistogramResult => {
  const errors = residuals(subset.map(FIELD.actual), subset.map(FIELD[model]));
  if (errors.length === 0) return { status: 'no-data' };
  return {
    status: 'ok',
    model,
    title: HISTOGRAM_TITLES[model],
    color: SERIES_STYLE[model].color,
    bins: histogram(errors, binCount),
    total: errors.length,
  };
};

// Histograms ignore the toggles; whether to show them is the view's call.
export const composeCharts = (
  subset: readonly ForecastRecord[],
  toggles: DisplayToggles
): ChartBundle => ({
  overlay: composeOverlay(subset, toggles),
  errorHistograms: {
    garch: composeErrorHistogram(subset, 'garch'),
    lstm: composeErrorHistogram(subset, 'lstm'),
  },
});
