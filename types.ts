export type ModelKey = 'garch' | 'lstm';
export type SeriesKey = 'actual' | ModelKey;

export interface ForecastRecord {
  date: string; // YYYY-MM-DD
  actualVolatility: number | null;
  garchVolatility: number | null;
  predictedVolatility: number | null;
}

export interface ForecastDataset {
  sourceId: string;
  version: string | null;
  records: readonly ForecastRecord[];
  droppedRows: number;
  loadedAt: number;
}

export interface DateRange {
  start: string;
  end: string;
}

export interface DisplayToggles {
  showGarch: boolean;
  showLstm: boolean;
}

export interface NoData {
  status: 'no-data';
}

export interface MetricsResult {
  status: 'ok';
  rmseGarch: number | null;
  rmseLstm: number | null;
  improvementPct: number | null;
  samples: Record<ModelKey, number>;
}

export type MetricsSummary = MetricsResult | NoData;

export interface SeriesPoint {
  date: string;
  value: number | null;
}

export interface SeriesSpec {
  key: SeriesKey;
  name: string;
  color: string;
  strokeWidth: number;
  dashed: boolean;
  points: SeriesPoint[];
}

export interface OverlayChartSpec {
  xLabel: string;
  yLabel: string;
  series: SeriesSpec[];
}

export interface HistogramBin {
  x0: number;
  x1: number;
  count: number;
}

export interface HistogramSpec {
  status: 'ok';
  model: ModelKey;
  title: string;
  color: string;
  bins: HistogramBin[];
  total: number;
}

export type HistogramResult = HistogramSpec | NoData;

export interface ChartBundle {
  overlay: OverlayChartSpec;
  errorHistograms: Record<ModelKey, HistogramResult>;
}
